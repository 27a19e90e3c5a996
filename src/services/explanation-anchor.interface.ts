import { DueLineItem, ExplanationResult } from '../types/calculation.types';

export interface IExplanationAnchor {
  /**
   * Joins line item rule ids to external clause references.
   * Never rejects: an unavailable or slow source degrades to an empty set.
   */
  anchor(items: DueLineItem[], includeExplanation: boolean): Promise<ExplanationResult>;
}
