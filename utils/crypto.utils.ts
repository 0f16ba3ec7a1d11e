import crypto from 'crypto';

export class CryptoUtils {
  static generateId(): string {
    return crypto.randomBytes(8).toString('hex');
  }

  static generateInvestigationId(): string {
    return `inv_${CryptoUtils.generateId()}`;
  }
}
