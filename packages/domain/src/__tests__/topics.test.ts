import { describe, it, expect } from '@jest/globals';
import { buildTelemetryTopic, parseTelemetryTopic, telemetryTopicFilter } from '../index.js';

describe('telemetry topics', () => {
  it('should build topics with and without a prefix', () => {
    expect(buildTelemetryTopic('hvac', 'unit_1_hvac')).toBe('hvac/unit_1_hvac');
    expect(buildTelemetryTopic('hvac', 'unit_1_hvac', 'site-a/telemetry')).toBe('site-a/telemetry/hvac/unit_1_hvac');
    expect(buildTelemetryTopic('hvac', 'd1', '/site-a/')).toBe('site-a/hvac/d1');
  });

  it('should build a subscription filter matching both segments', () => {
    expect(telemetryTopicFilter()).toBe('+/+');
    expect(telemetryTopicFilter('site-a')).toBe('site-a/+/+');
  });

  it('should parse a built topic back into its parts', () => {
    const topic = buildTelemetryTopic('space_temperature', 'unit_2_space_temp_kitchen', 'site-a');
    expect(parseTelemetryTopic(topic, 'site-a')).toEqual({
      sensorType: 'space_temperature',
      deviceId: 'unit_2_space_temp_kitchen',
    });
  });

  it('should reject topics outside the prefix or with the wrong depth', () => {
    expect(parseTelemetryTopic('other/hvac/d1', 'site-a')).toBeNull();
    expect(parseTelemetryTopic('hvac/d1', 'site-a')).toBeNull();
    expect(parseTelemetryTopic('hvac/d1/extra')).toBeNull();
    expect(parseTelemetryTopic('hvac')).toBeNull();
  });

  it('should reject segments outside the grammar', () => {
    expect(parseTelemetryTopic('hvac/d 1')).toBeNull();
    expect(parseTelemetryTopic('hvac/')).toBeNull();
    expect(parseTelemetryTopic('hv.ac/d1')).toBeNull();
  });

  it('should never route to the reserved error partition', () => {
    expect(parseTelemetryTopic('error/d1')).toBeNull();
  });
});
