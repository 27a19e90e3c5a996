import { TariffSchedule } from '../../types/tariff.types';
import { Result } from '../../types/result.types';

/**
 * Adapter for reading structured schedules produced by the ingestion pipeline.
 */
export interface IScheduleSource {
  /**
   * Loads the latest structured schedule.
   * @returns Result with success=true and data if loaded, success=true without data if the source is empty, success=false on error
   */
  loadSchedule(): Promise<Result<TariffSchedule>>;
}
