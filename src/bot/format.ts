import type { ForecastStatistics } from '@/services/storage/forecast-store';
import type { Forecast } from '@/services/weather/types';

// https://openweathermap.org/weather-data
export function formatForecast(forecast: Forecast): string {
  return [
    forecast.description,
    '',
    `temp: ${forecast.temperature.toFixed(2)} C`,
    `feels like: ${forecast.feelsLike.toFixed(2)} C`,
    '',
    `hum: ${forecast.humidity} %`,
    `wind: ${forecast.windSpeed.toFixed(2)} m/s`,
  ].join('\n');
}

export function formatStatistics(stat: ForecastStatistics): string {
  const { temperature, humidity, wind } = stat.recordHolders;
  return [
    'Total',
    `  records: ${stat.totalRecords}`,
    `  1st at: ${stat.firstRecordAt.toISOString()}`,
    '',
    'Top forecasts',
    `  temp: ${temperature.city}, ${temperature.value.toFixed(2)} C`,
    `  hum: ${humidity.city}, ${humidity.value} %`,
    `  wind: ${wind.city}, ${wind.value.toFixed(2)} m/s`,
  ].join('\n');
}
