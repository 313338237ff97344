export type WeatherQuery = {
  location: string;
  /** YYYY-MM-DD */
  date: string;
};

export type Coordinates = {
  latitude: number;
  longitude: number;
};

export type DayForecast = {
  date: string;
  temperatureMax: number;
  temperatureMin: number;
  temperatureMean: number;
  feltTemperatureMax: number;
  feltTemperatureMin: number;
  /** mm */
  precipitation: number;
  /** percent, 0-100 */
  precipitationProbability: number;
  /** m/s */
  windspeedMean: number;
  /** degrees, 0-360 */
  windDirection: number;
  pictocode: number;
  uvIndex: number;
  relativeHumidityMean: number;
};
