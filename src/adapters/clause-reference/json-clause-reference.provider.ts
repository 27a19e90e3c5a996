import { readFile } from 'fs/promises';
import { inject, injectable } from 'tsyringe';
import { z } from 'zod';
import { Result } from '../../types/result.types';
import { IClauseReferenceProvider } from './clause-reference-provider.interface';

// rule_id -> clause reference, as published alongside the semantic policy text
const ClauseReferenceFileSchema = z.record(z.string().min(1, 'Clause reference cannot be empty'));

@injectable()
export class JsonClauseReferenceProvider implements IClauseReferenceProvider {
  private referencesCache: Map<string, string> | null = null;

  constructor(@inject('ClauseReferencePath') private readonly dataPath: string) {}

  async getReferences(ruleIds: string[]): Promise<Result<Record<string, string>>> {
    const loadResult = await this.ensureCacheLoaded();
    if (!loadResult.success) {
      return { success: false, message: loadResult.message };
    }

    if (!this.referencesCache || this.referencesCache.size === 0) {
      return { success: true, message: `No clause references available in ${this.dataPath}` };
    }

    const references: Record<string, string> = {};
    for (const ruleId of ruleIds) {
      const reference = this.referencesCache.get(ruleId);
      if (reference !== undefined) {
        references[ruleId] = reference;
      }
    }

    return {
      success: true,
      data: references,
      message: `Resolved ${Object.keys(references).length} of ${ruleIds.length} clause reference(s)`
    };
  }

  private async ensureCacheLoaded(): Promise<Result<void>> {
    if (this.referencesCache !== null) {
      return { success: true, message: 'Cache already loaded' };
    }

    try {
      const fileContent = await readFile(this.dataPath, 'utf-8');
      const validationResult = ClauseReferenceFileSchema.safeParse(JSON.parse(fileContent));

      if (!validationResult.success) {
        const errors = validationResult.error.issues
          .map(issue => `${issue.path.join('.')}: ${issue.message}`)
          .join(', ');
        return { success: false, message: `Clause reference validation failed: ${errors}` };
      }

      this.referencesCache = new Map(Object.entries(validationResult.data));
      return { success: true, message: 'Clause references loaded successfully' };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      return { success: false, message: `Failed to load clause references: ${errorMessage}` };
    }
  }
}
