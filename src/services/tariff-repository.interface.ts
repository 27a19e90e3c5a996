import { IScheduleSource } from '../adapters/schedule/schedule-source.interface';
import { TariffSchedule } from '../types/tariff.types';
import { Result } from '../types/result.types';

export interface ITariffRepository {
  /**
   * Integrity-checks, freezes and atomically publishes a schedule.
   * @throws ScheduleIntegrityError when the schedule breaks a tariff invariant
   */
  publish(schedule: TariffSchedule): string;

  /** Loads a schedule from a source and publishes it; publications are serialised. */
  publishFrom(source: IScheduleSource): Promise<Result<string>>;

  /**
   * Returns the latest schedule covering the port, or the pinned version.
   * @throws NotFoundError when no schedule matches
   */
  getSnapshot(port: string, version?: string): TariffSchedule;

  hasPort(port: string): boolean;
  listPorts(): string[];
  listVersions(): string[];
}
