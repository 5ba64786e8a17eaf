export interface DailyForecast {
  date: string; // YYYY-MM-DD, local to the requested timezone
  tempHighF: number;
  tempLowF: number;
  precipMM: number;
  windMaxMPH: number;
  weatherCode: number; // WMO code
}

export interface ForecastPort {
  getDailyForecast(lat: number, lon: number): Promise<DailyForecast>;
}
