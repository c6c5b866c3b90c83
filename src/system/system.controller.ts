// src/system/system.controller.ts
import { Controller, Get } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { SystemService } from './system.service';
import { successResponse } from '../common/dto/standard-response.dto';
import { ApiSuccessResponseDto } from '../common/dto/api-response.dto';

@ApiTags('system')
@Controller('system')
export class SystemController {
  constructor(private readonly systemService: SystemService) {}

  @Get('status')
  @ApiOperation({
    summary: 'Service status',
    description:
      'Location cache connectivity and the upstream endpoints in use.\n\n' +
      '- `database`: connected / unavailable\n' +
      '- `upstreams.geocoding`, `upstreams.forecast`: configured base URLs',
  })
  @ApiResponse({
    status: 200,
    description: 'Status (standard envelope)',
    type: ApiSuccessResponseDto,
  })
  getStatus() {
    const status = this.systemService.getStatus();
    return successResponse(status);
  }
}
