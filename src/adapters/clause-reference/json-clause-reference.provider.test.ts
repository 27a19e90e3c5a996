import 'reflect-metadata';
import { readFile } from 'fs/promises';
import { isFailure, isNotFound, isSuccess } from '../../types/result.types';
import { JsonClauseReferenceProvider } from './json-clause-reference.provider';

jest.mock('fs/promises', () => ({
  readFile: jest.fn()
}));

describe('JsonClauseReferenceProvider', () => {
  const mockDataPath = '/fake/path/clause-references.json';
  let provider: JsonClauseReferenceProvider;

  beforeEach(() => {
    jest.clearAllMocks();
    provider = new JsonClauseReferenceProvider(mockDataPath);
  });

  describe('getReferences', () => {
    it('should return references for the requested rule ids only', async () => {
      // Arrange
      (readFile as jest.Mock).mockResolvedValue(
        JSON.stringify({ 'LD-ALL': 'Section 1.1', 'PD-DUR': 'Section 4.1.1', 'PIL-DUR': 'Section 3.3' })
      );

      // Act
      const result = await provider.getReferences(['LD-ALL', 'PD-DUR', 'EX-UNKNOWN']);

      // Assert
      expect(isSuccess(result)).toBe(true);
      if (!isSuccess(result)) return;
      expect(result.data).toEqual({ 'LD-ALL': 'Section 1.1', 'PD-DUR': 'Section 4.1.1' });
      expect(result.message).toBe('Resolved 2 of 3 clause reference(s)');
    });

    // Test: The file is read once and served from cache afterwards
    it('should read the file only once across lookups', async () => {
      (readFile as jest.Mock).mockResolvedValue(JSON.stringify({ 'LD-ALL': 'Section 1.1' }));

      await provider.getReferences(['LD-ALL']);
      await provider.getReferences(['LD-ALL']);

      expect(readFile).toHaveBeenCalledTimes(1);
    });

    it('should return success without data for an empty reference file', async () => {
      (readFile as jest.Mock).mockResolvedValue('{}');

      const result = await provider.getReferences(['LD-ALL']);

      expect(isNotFound(result)).toBe(true);
    });

    it('should return failure for a reference that is not a string', async () => {
      (readFile as jest.Mock).mockResolvedValue(JSON.stringify({ 'LD-ALL': 11 }));

      const result = await provider.getReferences(['LD-ALL']);

      expect(isFailure(result)).toBe(true);
      expect(result.message).toContain('Clause reference validation failed: LD-ALL:');
    });

    it('should return failure when the file cannot be read', async () => {
      (readFile as jest.Mock).mockRejectedValue(new Error('EACCES: permission denied'));

      const result = await provider.getReferences(['LD-ALL']);

      expect(isFailure(result)).toBe(true);
      expect(result.message).toBe('Failed to load clause references: EACCES: permission denied');
    });
  });
});
