export const MIN_CLAIM_LENGTH = 10;

export const INVALID_CLAIM_MESSAGE = `Please enter a valid claim (at least ${MIN_CLAIM_LENGTH} characters)`;

export class ValidationUtils {
  static validateClaim(claim: unknown): boolean {
    if (typeof claim !== 'string') return false;
    if (claim.trim().length < MIN_CLAIM_LENGTH) return false;

    // Reject input made only of punctuation or symbols
    return /[a-zA-Z0-9]/.test(claim);
  }
}

export const validate = (claim: string): boolean => ValidationUtils.validateClaim(claim);
