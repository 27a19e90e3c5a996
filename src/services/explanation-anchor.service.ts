import { inject, injectable } from 'tsyringe';
import { IClauseReferenceProvider } from '../adapters/clause-reference/clause-reference-provider.interface';
import { ExplanationUnavailableError } from '../errors/tariff.errors';
import { DueLineItem, ExplanationResult, ExplanationStatus } from '../types/calculation.types';
import { isSuccess, Result } from '../types/result.types';
import { IExplanationAnchor } from './explanation-anchor.interface';

const TIMED_OUT = Symbol('timed-out');

@injectable()
export class ExplanationAnchorService implements IExplanationAnchor {
  constructor(
    @inject('IClauseReferenceProvider') private readonly provider: IClauseReferenceProvider,
    @inject('ExplanationTimeoutMs') private readonly timeoutMs: number
  ) {}

  async anchor(items: DueLineItem[], includeExplanation: boolean): Promise<ExplanationResult> {
    if (!includeExplanation) {
      return { status: ExplanationStatus.NOT_REQUESTED };
    }

    const ruleIds = this.collectRuleIds(items);

    let outcome: Result<Record<string, string>> | typeof TIMED_OUT;
    try {
      outcome = await this.withTimeout(this.provider.getReferences(ruleIds));
    } catch (error) {
      return this.unavailable(
        ExplanationStatus.UNAVAILABLE,
        error instanceof Error ? error.message : String(error)
      );
    }

    if (outcome === TIMED_OUT) {
      return this.unavailable(
        ExplanationStatus.TIMED_OUT,
        `clause reference lookup exceeded ${this.timeoutMs}ms`
      );
    }
    if (!isSuccess(outcome)) {
      return this.unavailable(ExplanationStatus.UNAVAILABLE, outcome.message);
    }

    // Rebuild in rule order so the output does not depend on the provider
    const references: Record<string, string> = {};
    for (const ruleId of ruleIds) {
      const reference = outcome.data[ruleId];
      if (reference !== undefined) {
        references[ruleId] = reference;
      }
    }
    return { status: ExplanationStatus.ANCHORED, references };
  }

  /** Rule ids of line items and of the exemptions applied to them, first appearance first. */
  private collectRuleIds(items: DueLineItem[]): string[] {
    const ruleIds = new Set<string>();
    for (const item of items) {
      ruleIds.add(item.ruleId);
      if (item.exemptionApplied) {
        ruleIds.add(item.exemptionApplied.ruleId);
      }
    }
    return [...ruleIds];
  }

  private async withTimeout<T>(operation: Promise<T>): Promise<T | typeof TIMED_OUT> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<typeof TIMED_OUT>(resolve => {
      timer = setTimeout(() => resolve(TIMED_OUT), this.timeoutMs);
    });

    try {
      return await Promise.race([operation, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private unavailable(
    status: ExplanationStatus.UNAVAILABLE | ExplanationStatus.TIMED_OUT,
    reason: string
  ): ExplanationResult {
    const error = new ExplanationUnavailableError(`Explanation references unavailable: ${reason}`);
    console.warn(`[Explanation Anchor] ${error.message}`);
    return { status, error: error.message };
  }
}
