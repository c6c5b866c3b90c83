// src/forecast/interfaces/forecast.interface.ts

/**
 * One display row: `Mon 14:00` / `18.5°C`
 */
export interface DisplayForecastEntry {
  label: string;
  temperatureLabel: string;
}

/**
 * Hourly forecast ready for rendering, in upstream order.
 */
export interface WeatherDisplay {
  city: string;
  forecasts: DisplayForecastEntry[];
}
