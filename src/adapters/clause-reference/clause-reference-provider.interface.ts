import { Result } from '../../types/result.types';

/**
 * External source mapping tariff rule ids to policy clause references.
 */
export interface IClauseReferenceProvider {
  /**
   * Looks up clause references for the given rule ids.
   * @returns Result with success=true and data (possibly partial) if available, success=true without data if no mapping exists, success=false on error
   */
  getReferences(ruleIds: string[]): Promise<Result<Record<string, string>>>;
}
