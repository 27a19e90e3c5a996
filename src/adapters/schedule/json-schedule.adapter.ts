import { readFile } from 'fs/promises';
import { inject, injectable } from 'tsyringe';
import { TariffSchedule } from '../../types/tariff.types';
import { Result } from '../../types/result.types';
import { IScheduleSource } from './schedule-source.interface';
import { parseSchedulePayload } from './schedule-payload.mapper';

@injectable()
export class JsonScheduleAdapter implements IScheduleSource {
  constructor(@inject('SchedulePath') private readonly schedulePath: string) {}

  async loadSchedule(): Promise<Result<TariffSchedule>> {
    let raw: unknown;
    try {
      const fileContent = await readFile(this.schedulePath, 'utf-8');
      if (fileContent.trim().length === 0) {
        return {
          success: true,
          message: `Schedule file ${this.schedulePath} is empty`
        };
      }
      raw = JSON.parse(fileContent);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      return {
        success: false,
        message: `Failed to load schedule: ${errorMessage}`
      };
    }

    const parsed = parseSchedulePayload(raw);
    if (!parsed.success) {
      console.warn(`[Schedule Adapter] Rejected ${this.schedulePath}: ${parsed.message}`);
    }
    return parsed;
  }
}
