import type { Account } from '../../domain/auth/account.js';
import { recommendationsFor } from '../../domain/airQuality/aqi.js';
import { POLLUTANTS, type AirQualityReport, type Pollutant } from '../airQuality/airQualityClient.js';

const RULE = '-'.repeat(70);

const POLLUTANT_LABELS: Record<Pollutant, string> = {
  pm25: 'PM2.5 (fine particles)',
  pm10: 'PM10 (coarse particles)',
  o3: 'O3 (ozone)',
  no2: 'NO2 (nitrogen dioxide)',
  so2: 'SO2 (sulphur dioxide)',
  co: 'CO (carbon monoxide)',
};

function value(reading: number | null, unit = ''): string {
  return reading === null ? 'N/A' : `${reading}${unit}`;
}

export function renderAccount(account: Account): string[] {
  return [
    `  ID:       ${account.id}`,
    `  Username: ${account.username}`,
    `  Email:    ${account.email}`,
    `  Role:     ${account.role}`,
  ];
}

export function renderAccountTable(accounts: readonly Account[]): string[] {
  if (accounts.length === 0) {
    return ['No accounts registered'];
  }
  const row = (id: string, username: string, email: string, role: string) =>
    `${id.padEnd(5)} ${username.padEnd(20)} ${email.padEnd(30)} ${role}`;

  return [
    `Total accounts: ${accounts.length}`,
    RULE,
    row('ID', 'Username', 'Email', 'Role'),
    RULE,
    ...accounts.map((a) => row(String(a.id), a.username, a.email, a.role)),
    RULE,
  ];
}

export function renderAirQualityReport(report: AirQualityReport): string[] {
  const recommendations = recommendationsFor(report.aqi);

  return [
    '='.repeat(70),
    ` AIR QUALITY REPORT: ${report.city}`,
    '='.repeat(70),
    `Station:      ${report.station}`,
    `Measured at:  ${report.measuredAt ?? 'N/A'}`,
    ...(report.coordinates ? [`Coordinates:  ${report.coordinates.join(', ')}`] : []),
    `AQI:          ${value(report.aqi)}`,
    `Category:     ${report.category}`,
    `Danger level: ${report.dangerLevel}`,
    '',
    'POLLUTANTS',
    RULE,
    ...POLLUTANTS.map((p) => `  ${POLLUTANT_LABELS[p].padEnd(26)} ${value(report.pollutants[p])}`),
    '',
    'WEATHER',
    RULE,
    `  Temperature: ${value(report.temperature, ' °C')}`,
    `  Humidity:    ${value(report.humidity, '%')}`,
    `  Pressure:    ${value(report.pressure, ' hPa')}`,
    '',
    'RECOMMENDATIONS',
    RULE,
    ...(recommendations.length > 0
      ? recommendations.map((r) => `  * ${r}`)
      : ['  Not enough data to make recommendations']),
    '='.repeat(70),
  ];
}
