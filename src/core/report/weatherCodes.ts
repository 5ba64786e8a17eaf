/** WMO weather interpretation codes as returned by Open-Meteo. */
export enum WeatherCode {
  ClearSky = 0,
  MainlyClear = 1,
  PartlyCloudy = 2,
  Overcast = 3,
  Fog = 45,
  DepositingRimeFog = 48,
  DrizzleLight = 51,
  DrizzleModerate = 53,
  DrizzleDense = 55,
  FreezingDrizzleLight = 56,
  FreezingDrizzleDense = 57,
  RainSlight = 61,
  RainModerate = 63,
  RainHeavy = 65,
  FreezingRainLight = 66,
  FreezingRainHeavy = 67,
  SnowSlight = 71,
  SnowModerate = 73,
  SnowHeavy = 75,
  SnowGrains = 77,
  RainShowersSlight = 80,
  RainShowersModerate = 81,
  RainShowersViolent = 82,
  SnowShowersSlight = 85,
  SnowShowersHeavy = 86,
  Thunderstorm = 95,
  ThunderstormSlightHail = 96,
  ThunderstormHeavyHail = 99,
}

export const UNKNOWN_CONDITION = 'Unknown';

const WEATHER_CODE_LABELS: Readonly<Record<WeatherCode, string>> = {
  [WeatherCode.ClearSky]: 'Clear sky',
  [WeatherCode.MainlyClear]: 'Mainly clear',
  [WeatherCode.PartlyCloudy]: 'Partly cloudy',
  [WeatherCode.Overcast]: 'Overcast',
  [WeatherCode.Fog]: 'Fog',
  [WeatherCode.DepositingRimeFog]: 'Depositing rime fog',
  [WeatherCode.DrizzleLight]: 'Drizzle (light)',
  [WeatherCode.DrizzleModerate]: 'Drizzle (moderate)',
  [WeatherCode.DrizzleDense]: 'Drizzle (dense)',
  [WeatherCode.FreezingDrizzleLight]: 'Freezing drizzle (light)',
  [WeatherCode.FreezingDrizzleDense]: 'Freezing drizzle (dense)',
  [WeatherCode.RainSlight]: 'Rain (slight)',
  [WeatherCode.RainModerate]: 'Rain (moderate)',
  [WeatherCode.RainHeavy]: 'Rain (heavy)',
  [WeatherCode.FreezingRainLight]: 'Freezing rain (light)',
  [WeatherCode.FreezingRainHeavy]: 'Freezing rain (heavy)',
  [WeatherCode.SnowSlight]: 'Snow (slight)',
  [WeatherCode.SnowModerate]: 'Snow (moderate)',
  [WeatherCode.SnowHeavy]: 'Snow (heavy)',
  [WeatherCode.SnowGrains]: 'Snow grains',
  [WeatherCode.RainShowersSlight]: 'Rain showers (slight)',
  [WeatherCode.RainShowersModerate]: 'Rain showers (moderate)',
  [WeatherCode.RainShowersViolent]: 'Rain showers (violent)',
  [WeatherCode.SnowShowersSlight]: 'Snow showers (slight)',
  [WeatherCode.SnowShowersHeavy]: 'Snow showers (heavy)',
  [WeatherCode.Thunderstorm]: 'Thunderstorm',
  [WeatherCode.ThunderstormSlightHail]: 'Thunderstorm with slight hail',
  [WeatherCode.ThunderstormHeavyHail]: 'Thunderstorm with heavy hail',
};

function isWeatherCode(code: number): code is WeatherCode {
  return Object.prototype.hasOwnProperty.call(WEATHER_CODE_LABELS, code);
}

export function weatherCodeLabel(code: number): string {
  return isWeatherCode(code) ? WEATHER_CODE_LABELS[code] : UNKNOWN_CONDITION;
}
