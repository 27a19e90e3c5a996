import { ResolvedItem, TariffSchedule } from '../types/tariff.types';
import { VesselProfile } from '../types/vessel.types';

export interface IRateResolver {
  /**
   * Selects the tiers and fee rules that apply to a vessel call, in the
   * schedule's due type declaration order, each with its exemption if any.
   * @throws NotFoundError when no row of the port is in force on the arrival date
   * @throws AmbiguousTierError when more than one tier matches a due type
   */
  resolve(schedule: TariffSchedule, profile: VesselProfile): ResolvedItem[];
}
