import { randomInt, timingSafeEqual } from 'node:crypto';

export const PAIRING_CODE_LENGTH = 6;

/**
 * Short numeric code shown on the responder and typed on the initiator.
 * A new code is drawn after every successful pairing.
 */
export class PairingKey {
  private code: string;

  constructor(code?: string) {
    this.code = code ?? PairingKey.generate();
  }

  static generate(): string {
    return randomInt(0, 10 ** PAIRING_CODE_LENGTH).toString().padStart(PAIRING_CODE_LENGTH, '0');
  }

  current(): string {
    return this.code;
  }

  rotate(): string {
    this.code = PairingKey.generate();
    return this.code;
  }

  matches(proof: string | undefined): boolean {
    if (proof === undefined) {
      return false;
    }
    const expected = Buffer.from(this.code);
    const given = Buffer.from(proof);
    return expected.length === given.length && timingSafeEqual(expected, given);
  }
}
