import { describe, expect, it } from 'vitest';

import { ExitCodes } from '../exit-codes.js';

describe('exit-codes', () => {
  describe('ExitCodes', () => {
    it('should define SUCCESS as 0', () => {
      expect(ExitCodes.SUCCESS).toBe(0);
    });

    it('should define error codes', () => {
      expect(ExitCodes.GENERAL_ERROR).toBe(1);
      expect(ExitCodes.INVALID_ARGS).toBe(2);
      expect(ExitCodes.NOT_FOUND).toBe(4);
      expect(ExitCodes.DATABASE_ERROR).toBe(7);
      expect(ExitCodes.VALIDATION_ERROR).toBe(8);
      expect(ExitCodes.UNCERTAIN_STATE).toBe(12);
    });

    it('should have unique exit codes', () => {
      const codes = Object.values(ExitCodes);
      expect(new Set(codes).size).toBe(codes.length);
    });
  });
});
