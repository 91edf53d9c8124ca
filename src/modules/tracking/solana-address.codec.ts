import { Injectable } from '@nestjs/common';

import { InvalidAddressError } from '../../common/errors/whale-watch.errors';

const BASE58_ALPHABET: string = '123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz';
const ADDRESS_MIN_LENGTH = 32;
const ADDRESS_MAX_LENGTH = 44;
const PUBLIC_KEY_BYTE_LENGTH = 32;
const SHORT_FORMAT_MIN_LENGTH = 12;
const SHORT_FORMAT_EDGE_LENGTH = 4;
const BASE58_RADIX = 58n;
const BYTE_SHIFT = 8n;

const BASE58_MAP: ReadonlyMap<string, bigint> = new Map(
  BASE58_ALPHABET.split('').map((character: string, index: number): readonly [string, bigint] => [
    character,
    BigInt(index),
  ]),
);

/**
 * Validates wallet and mint addresses: base58 text that decodes to a 32-byte public key.
 */
@Injectable()
export class SolanaAddressCodec {
  public isValid(rawAddress: string): boolean {
    const candidate: string = rawAddress.trim();

    if (candidate.length < ADDRESS_MIN_LENGTH || candidate.length > ADDRESS_MAX_LENGTH) {
      return false;
    }

    return this.decodedByteLength(candidate) === PUBLIC_KEY_BYTE_LENGTH;
  }

  /** Returns the trimmed address or throws InvalidAddressError. */
  public parse(rawAddress: string): string {
    if (!this.isValid(rawAddress)) {
      throw new InvalidAddressError(rawAddress);
    }

    return rawAddress.trim();
  }

  public formatShort(address: string): string {
    if (address.length <= SHORT_FORMAT_MIN_LENGTH) {
      return address;
    }

    return `${address.slice(0, SHORT_FORMAT_EDGE_LENGTH)}...${address.slice(-SHORT_FORMAT_EDGE_LENGTH)}`;
  }

  private decodedByteLength(value: string): number | null {
    let numericValue: bigint = 0n;

    for (const character of value) {
      const digit: bigint | undefined = BASE58_MAP.get(character);

      if (digit === undefined) {
        return null;
      }

      numericValue = numericValue * BASE58_RADIX + digit;
    }

    // Each leading '1' encodes a zero byte.
    let byteLength: number = 0;
    while (byteLength < value.length && value[byteLength] === '1') {
      byteLength += 1;
    }

    while (numericValue > 0n) {
      byteLength += 1;
      numericValue >>= BYTE_SHIFT;
    }

    return byteLength;
  }
}
