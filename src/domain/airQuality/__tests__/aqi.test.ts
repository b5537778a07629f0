import { describe, it, expect } from 'vitest';
import { classifyAqi, dangerLevel, recommendationsFor } from '../aqi.js';

describe('AQI classification', () => {
  it('should classify band boundaries inclusively', () => {
    expect(classifyAqi(0)).toBe('Good');
    expect(classifyAqi(50)).toBe('Good');
    expect(classifyAqi(51)).toBe('Moderate');
    expect(classifyAqi(100)).toBe('Moderate');
    expect(classifyAqi(101)).toBe('Unhealthy for Sensitive Groups');
    expect(classifyAqi(150)).toBe('Unhealthy for Sensitive Groups');
    expect(classifyAqi(151)).toBe('Unhealthy');
    expect(classifyAqi(200)).toBe('Unhealthy');
    expect(classifyAqi(201)).toBe('Very Unhealthy');
    expect(classifyAqi(300)).toBe('Very Unhealthy');
    expect(classifyAqi(301)).toBe('Hazardous');
    expect(classifyAqi(999)).toBe('Hazardous');
  });

  it('should report Unknown without a numeric index', () => {
    expect(classifyAqi(null)).toBe('Unknown');
    expect(classifyAqi(Number.NaN)).toBe('Unknown');
  });

  it('should map danger levels', () => {
    expect(dangerLevel(42)).toBe('LOW');
    expect(dangerLevel(75)).toBe('MEDIUM');
    expect(dangerLevel(180)).toBe('HIGH');
    expect(dangerLevel(201)).toBe('CRITICAL');
    expect(dangerLevel(null)).toBe('UNKNOWN');
  });

  it('should give recommendations per band', () => {
    expect(recommendationsFor(30)).toHaveLength(3);
    expect(recommendationsFor(30)[0]).toBe('Air quality is ideal for outdoor activities');
    expect(recommendationsFor(90)).toHaveLength(2);
    expect(recommendationsFor(150)[0]).toBe('Alert: apply mitigation measures immediately');
    expect(recommendationsFor(350)[0]).toBe(
      'CRITICAL: activate the environmental emergency plan'
    );
    expect(recommendationsFor(null)).toEqual([]);
  });
});
