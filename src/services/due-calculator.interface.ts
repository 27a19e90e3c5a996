import { DueLineItem } from '../types/calculation.types';
import { ResolvedItem } from '../types/tariff.types';
import { VesselProfile } from '../types/vessel.types';

export interface IDueCalculator {
  /**
   * Evaluates one resolved rule against the vessel profile.
   * @throws CalculationError when a conditional fee needs a flag the profile lacks or carries with the wrong type
   */
  compute(profile: VesselProfile, item: ResolvedItem): DueLineItem;
}
