import { PortDuesCsvRecord } from '../types/port-call-record.types';
import { BatchCalculationInput } from './tariff-calculation.interface';

export interface ICsvProcessor {
  readPortCalls(csvPath: string): Promise<BatchCalculationInput[]>;
  writePortDuesCsv(outputPath: string, records: PortDuesCsvRecord[]): Promise<void>;
}
