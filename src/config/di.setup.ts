import 'reflect-metadata';
import { container } from 'tsyringe';
import { IClauseReferenceProvider } from '../adapters/clause-reference/clause-reference-provider.interface';
import { JsonClauseReferenceProvider } from '../adapters/clause-reference/json-clause-reference.provider';
import { JsonScheduleAdapter } from '../adapters/schedule/json-schedule.adapter';
import { IScheduleSource } from '../adapters/schedule/schedule-source.interface';
import { IAggregator } from '../services/aggregator.interface';
import { AggregatorService } from '../services/aggregator.service';
import { CsvProcessorService } from '../services/csv-processor.service';
import { ICsvProcessor } from '../services/csv-processor.interface';
import { IDueCalculator } from '../services/due-calculator.interface';
import { DueCalculatorService } from '../services/due-calculator.service';
import { IExplanationAnchor } from '../services/explanation-anchor.interface';
import { ExplanationAnchorService } from '../services/explanation-anchor.service';
import { IGuardrailValidator } from '../services/guardrail-validator.interface';
import { GuardrailValidatorService } from '../services/guardrail-validator.service';
import { OpenAIRequestParserService } from '../services/openai-request-parser.service';
import { PatternRequestParserService } from '../services/pattern-request-parser.service';
import { IRateResolver } from '../services/rate-resolver.interface';
import { RateResolverService } from '../services/rate-resolver.service';
import { IRequestParser } from '../services/request-parser.interface';
import { ITariffCalculationService } from '../services/tariff-calculation.interface';
import { TariffCalculationService } from '../services/tariff-calculation.service';
import { ITariffRepository } from '../services/tariff-repository.interface';
import { TariffRepositoryService } from '../services/tariff-repository.service';
import { AppConfig } from './app.config';

export function setupDI(config: AppConfig): void {
  // Register configuration values
  container.register('SchedulePath', { useValue: config.data.schedulePath });
  container.register('ClauseReferencePath', { useValue: config.data.clauseReferencePath });
  container.register('ScheduleRetention', { useValue: config.scheduleRetention });
  container.register('ExplanationTimeoutMs', { useValue: config.explanationTimeoutMs });
  container.register('BatchSize', { useValue: config.batchSize });
  container.register('AppConfig', { useValue: config });

  // Register adapters
  container.register<IScheduleSource>('IScheduleSource', {
    useClass: JsonScheduleAdapter
  });

  container.registerSingleton<IClauseReferenceProvider>(
    'IClauseReferenceProvider',
    JsonClauseReferenceProvider
  );

  // The repository owns the published snapshots, so every resolution shares one
  container.registerSingleton<ITariffRepository>('ITariffRepository', TariffRepositoryService);

  // Register core services
  container.register<IGuardrailValidator>('IGuardrailValidator', {
    useClass: GuardrailValidatorService
  });

  container.register<IRateResolver>('IRateResolver', {
    useClass: RateResolverService
  });

  container.register<IDueCalculator>('IDueCalculator', {
    useClass: DueCalculatorService
  });

  container.register<IAggregator>('IAggregator', {
    useClass: AggregatorService
  });

  container.register<IExplanationAnchor>('IExplanationAnchor', {
    useClass: ExplanationAnchorService
  });

  container.register<ITariffCalculationService>('ITariffCalculationService', {
    useClass: TariffCalculationService
  });

  // Register collaborators outside the core
  if (config.openai) {
    container.register('OpenAIConfig', { useValue: config.openai });
    container.register<IRequestParser>('IRequestParser', {
      useClass: OpenAIRequestParserService
    });
  } else {
    container.register<IRequestParser>('IRequestParser', {
      useClass: PatternRequestParserService
    });
  }

  container.register<ICsvProcessor>('ICsvProcessor', {
    useClass: CsvProcessorService
  });
}
