import * as fs from 'fs';
import { parse } from 'csv-parse';
import { stringify } from 'csv-stringify';
import { injectable } from 'tsyringe';
import { PortCallCsvRow, PortDuesCsvRecord } from '../types/port-call-record.types';
import { ICsvProcessor } from './csv-processor.interface';
import { BatchCalculationInput } from './tariff-calculation.interface';

/**
 * Turns a CSV row into the raw request shape the guardrail validates.
 * Values that do not look like numbers or booleans are passed through as
 * text so the guardrail reports them.
 */
export function toRawRequest(row: PortCallCsvRow): Record<string, unknown> {
  const raw: Record<string, unknown> = {
    port: row.port,
    grossTonnage: toNumberIfNumeric(row.grossTonnage),
    arrivalDate: row.arrivalDate,
    departureDate: row.departureDate,
    includeExplanation: row.includeExplanation ? toBooleanIfBoolean(row.includeExplanation) : false
  };

  if (row.flags && row.flags.trim().length > 0) {
    const flags: Record<string, unknown> = {};
    for (const pair of row.flags.split(';')) {
      const [name, value = ''] = pair.split('=').map(part => part.trim());
      if (name) {
        flags[name] = toBooleanIfBoolean(value);
      }
    }
    raw.flags = flags;
  }

  return raw;
}

function toNumberIfNumeric(value: string | undefined): unknown {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const numeric = Number(value);
  return Number.isNaN(numeric) ? value : numeric;
}

function toBooleanIfBoolean(value: string): boolean | string {
  const lower = value.toLowerCase();
  if (lower === 'true') return true;
  if (lower === 'false') return false;
  return value;
}

@injectable()
export class CsvProcessorService implements ICsvProcessor {
  async readPortCalls(csvPath: string): Promise<BatchCalculationInput[]> {
    return new Promise((resolve, reject) => {
      const inputs: BatchCalculationInput[] = [];

      fs.createReadStream(csvPath)
        .pipe(parse({ columns: true, skip_empty_lines: true, trim: true }))
        .on('data', (row: PortCallCsvRow) => {
          if (row.callId) {
            inputs.push({ requestId: row.callId, request: toRawRequest(row) });
          }
        })
        .on('end', () => resolve(inputs))
        .on('error', (error) => reject(error));
    });
  }

  async writePortDuesCsv(
    outputPath: string,
    records: PortDuesCsvRecord[]
  ): Promise<void> {
    return new Promise((resolve, reject) => {
      const columns = [
        'callId',
        'scheduleVersion',
        'dueType',
        'ruleId',
        'tierApplied',
        'baseAmount',
        'currency',
        'exemptionApplied',
        'clauseReference',
        'callTotals',
        'error'
      ];

      stringify(records, { header: true, columns }, (err, output) => {
        if (err) {
          reject(err);
          return;
        }

        fs.writeFile(outputPath, output, (writeErr) => {
          if (writeErr) {
            reject(writeErr);
            return;
          }
          resolve();
        });
      });
    });
  }
}
