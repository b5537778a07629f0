export type AqiCategory =
  | 'Good'
  | 'Moderate'
  | 'Unhealthy for Sensitive Groups'
  | 'Unhealthy'
  | 'Very Unhealthy'
  | 'Hazardous'
  | 'Unknown';

export type DangerLevel = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL' | 'UNKNOWN';

interface AqiBand {
  readonly max: number;
  readonly category: AqiCategory;
}

// Upper bounds are inclusive; anything above the last band is Hazardous.
const AQI_BANDS: readonly AqiBand[] = [
  { max: 50, category: 'Good' },
  { max: 100, category: 'Moderate' },
  { max: 150, category: 'Unhealthy for Sensitive Groups' },
  { max: 200, category: 'Unhealthy' },
  { max: 300, category: 'Very Unhealthy' },
];

export function classifyAqi(aqi: number | null): AqiCategory {
  if (aqi === null || !Number.isFinite(aqi)) {
    return 'Unknown';
  }
  return AQI_BANDS.find((band) => aqi <= band.max)?.category ?? 'Hazardous';
}

export function dangerLevel(aqi: number | null): DangerLevel {
  if (aqi === null || !Number.isFinite(aqi)) {
    return 'UNKNOWN';
  }
  if (aqi <= 50) return 'LOW';
  if (aqi <= 100) return 'MEDIUM';
  if (aqi <= 200) return 'HIGH';
  return 'CRITICAL';
}

export function recommendationsFor(aqi: number | null): string[] {
  if (aqi === null || !Number.isFinite(aqi)) {
    return [];
  }
  if (aqi <= 50) {
    return [
      'Air quality is ideal for outdoor activities',
      'Conditions favour solar energy initiatives',
      'Good moment for environmental awareness campaigns',
    ];
  }
  if (aqi <= 100) {
    return [
      'Air quality is acceptable, keep monitoring the trend',
      'Consider preventive emission-reduction measures',
    ];
  }
  if (aqi <= 200) {
    return [
      'Alert: apply mitigation measures immediately',
      'Limit activities that add to pollution',
      'Activate protection protocols for vulnerable groups',
    ];
  }
  return [
    'CRITICAL: activate the environmental emergency plan',
    'Suspend non-essential polluting activities',
    'Coordinate corrective actions with the authorities',
  ];
}
