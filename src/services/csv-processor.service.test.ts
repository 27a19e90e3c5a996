import 'reflect-metadata';
import { toRawRequest } from './csv-processor.service';

describe('toRawRequest', () => {
  it('should convert a CSV row to the raw request shape', () => {
    // Act
    const raw = toRawRequest({
      callId: 'CALL-001',
      port: 'DUR',
      grossTonnage: '51300',
      arrivalDate: '2024-01-10',
      departureDate: '2024-01-13',
      flags: '',
      includeExplanation: 'TRUE'
    });

    // Assert
    expect(raw).toEqual({
      port: 'DUR',
      grossTonnage: 51300,
      arrivalDate: '2024-01-10',
      departureDate: '2024-01-13',
      includeExplanation: true
    });
  });

  // Test: name=value pairs become typed flags
  it('should parse flag pairs into booleans and strings', () => {
    const raw = toRawRequest({
      callId: 'CALL-003',
      port: 'CPT',
      grossTonnage: '31000',
      arrivalDate: '2024-05-14',
      departureDate: '2024-05-16',
      flags: 'outside_working_hours=true; vessel_type=container;coaster=false'
    });

    expect(raw.flags).toEqual({
      outside_working_hours: true,
      vessel_type: 'container',
      coaster: false
    });
    expect(raw.includeExplanation).toBe(false);
  });

  // Test: Values the guardrail must reject are passed through untouched
  it('should pass non-numeric tonnage through as text', () => {
    const raw = toRawRequest({ callId: 'CALL-009', grossTonnage: 'about 5000' });

    expect(raw.grossTonnage).toBe('about 5000');
  });

  it('should leave an empty tonnage undefined so it is reported as missing', () => {
    const raw = toRawRequest({ callId: 'CALL-010', grossTonnage: '  ' });

    expect(raw.grossTonnage).toBeUndefined();
  });
});
