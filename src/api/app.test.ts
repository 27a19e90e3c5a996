import 'reflect-metadata';
import { Server } from 'http';
import { container } from 'tsyringe';
import { IClauseReferenceProvider } from '../adapters/clause-reference/clause-reference-provider.interface';
import { AggregatorService } from '../services/aggregator.service';
import { DueCalculatorService } from '../services/due-calculator.service';
import { ExplanationAnchorService } from '../services/explanation-anchor.service';
import { GuardrailValidatorService } from '../services/guardrail-validator.service';
import { PatternRequestParserService } from '../services/pattern-request-parser.service';
import { RateResolverService } from '../services/rate-resolver.service';
import { TariffCalculationService } from '../services/tariff-calculation.service';
import { TariffRepositoryService } from '../services/tariff-repository.service';
import { TariffSchedule } from '../types/tariff.types';
import { createApp } from './app';

const schedule: TariffSchedule = {
  version: '2024.1',
  currency: 'ZAR',
  ports: ['DUR', 'CPT'],
  dueTypes: ['light_dues', 'port_dues', 'outside_hours_surcharge'],
  rateTiers: [
    {
      ruleId: 'PD-DUR',
      port: 'DUR',
      dueType: 'port_dues',
      minGt: 0,
      maxGt: null,
      rate: 0.05,
      unit: 'per_gt_per_day',
      currency: 'ZAR',
      effectiveFrom: '2024-01-01',
      effectiveTo: null
    }
  ],
  feeRules: [
    {
      ruleId: 'LD-ALL',
      port: '*',
      dueType: 'light_dues',
      rate: 500,
      unit: 'flat',
      currency: 'ZAR',
      effectiveFrom: '2024-01-01',
      effectiveTo: null
    },
    {
      ruleId: 'OWH-CPT',
      port: 'CPT',
      dueType: 'outside_hours_surcharge',
      rate: 950,
      unit: 'flat',
      currency: 'ZAR',
      condition: { flag: 'outside_working_hours', comparison: 'eq', value: true },
      effectiveFrom: '2024-01-01',
      effectiveTo: null
    }
  ],
  exemptions: []
};

const durbanCall = {
  port: 'DUR',
  grossTonnage: 51300,
  arrivalDate: '2024-01-10',
  departureDate: '2024-01-13'
};

describe('API routes', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    const repository = new TariffRepositoryService(5);
    repository.publish(schedule);
    const provider: IClauseReferenceProvider = {
      getReferences: jest.fn()
    };

    const scope = container.createChildContainer();
    scope.register('ITariffRepository', { useValue: repository });
    scope.register('IRequestParser', { useValue: new PatternRequestParserService() });
    scope.register('ITariffCalculationService', {
      useValue: new TariffCalculationService(
        new GuardrailValidatorService(repository),
        repository,
        new RateResolverService(),
        new DueCalculatorService(),
        new AggregatorService(),
        new ExplanationAnchorService(provider, 100),
        5
      )
    });

    server = await new Promise<Server>(resolve => {
      const listening = createApp(scope).listen(0, () => resolve(listening));
    });
    const address = server.address();
    baseUrl = typeof address === 'object' && address !== null ? `http://127.0.0.1:${address.port}` : '';
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
    jest.restoreAllMocks();
  });

  function post(path: string, body: unknown) {
    return fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body)
    });
  }

  describe('POST /api/calculate', () => {
    it('should return the calculated dues', async () => {
      // Act
      const response = await post('/api/calculate', durbanCall);

      // Assert
      expect(response.status).toBe(200);
      const body = await response.json();
      expect(body).toMatchObject({ success: true, result: { totals: { ZAR: 8195 }, scheduleVersion: '2024.1' } });
    });

    it('should answer 400 with the failing field for an invalid request', async () => {
      const response = await post('/api/calculate', { ...durbanCall, grossTonnage: -5 });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        success: false,
        error: 'Invalid grossTonnage: must be a positive finite number',
        code: 'VALIDATION_ERROR',
        field: 'grossTonnage',
        constraint: 'must be a positive finite number'
      });
    });

    it('should answer 404 when no tariff applies', async () => {
      const response = await post('/api/calculate', { ...durbanCall, arrivalDate: '2023-06-01', departureDate: '2023-06-02' });

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({ success: false, error: 'No applicable tariff', code: 'NOT_FOUND' });
    });

    // Test: Data defects reach the caller without rule details
    it('should answer an opaque 500 for a tariff data defect', async () => {
      const response = await post('/api/calculate', { ...durbanCall, port: 'CPT' });

      expect(response.status).toBe(500);
      expect(await response.json()).toEqual({
        success: false,
        error: 'Calculation failed because of a tariff data defect',
        code: 'CALCULATION_ERROR'
      });
    });
  });

  describe('POST /api/calculate/natural', () => {
    it('should parse free text and calculate through the guardrail', async () => {
      const response = await post('/api/calculate/natural', {
        query: 'Durban, 51300 GT, arriving 2024-01-10 for 3 days'
      });

      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({
        success: true,
        parsedRequest: { port: 'DUR', grossTonnage: 51300 },
        result: { totals: { ZAR: 8195 } }
      });
    });

    it('should answer 400 without a query', async () => {
      const response = await post('/api/calculate/natural', {});

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        success: false,
        error: 'Invalid request. query string is required.'
      });
    });
  });

  describe('POST /api/schedules', () => {
    it('should answer 400 for a malformed payload', async () => {
      const response = await post('/api/schedules', { version: '2024.2' });

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({ success: false });
    });

    it('should answer 422 for a schedule that fails the integrity audit', async () => {
      // Arrange: the version is already published
      const payload = {
        version: '2024.1',
        currency: 'ZAR',
        ports: ['DUR'],
        due_types: ['light_dues']
      };

      // Act
      const response = await post('/api/schedules', payload);

      // Assert
      expect(response.status).toBe(422);
      expect(await response.json()).toEqual({
        success: false,
        error: 'Schedule 2024.1 rejected: version 2024.1 has already been published',
        code: 'SCHEDULE_INTEGRITY',
        issues: ['version 2024.1 has already been published']
      });
    });
  });

  describe('GET routes', () => {
    it('should list published ports and versions', async () => {
      const response = await fetch(`${baseUrl}/api/ports`);

      expect(await response.json()).toEqual({ ports: ['CPT', 'DUR'], versions: ['2024.1'] });
    });

    it('should answer 404 for a port without a schedule', async () => {
      const response = await fetch(`${baseUrl}/api/schedules/els`);

      expect(response.status).toBe(404);
    });

    it('should report health', async () => {
      const response = await fetch(`${baseUrl}/health`);

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ status: 'ok', ports: 2 });
    });
  });
});
