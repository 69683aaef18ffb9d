/**
 * Locations and the Locator
 *
 * A Location identifies one realized occurrence of a located element. The
 * key is derived from a structural hash of the element plus a disambiguator
 * that counts earlier occurrences of the same hash within the pass, so the
 * same content realized in the same order gets the same keys in every pass.
 *
 * Locations are opaque: document order is owned by the Introspector.
 */

import { hashString } from '../content/value.js';

export class Location {
  readonly isLocation = true;

  constructor(readonly key: string) {}

  equals(other: Location): boolean {
    return this.key === other.key;
  }

  toString(): string {
    return `loc(${this.key})`;
  }
}

/**
 * Hands out locations for one realization pass
 */
export class Locator {
  private seen = new Map<string, number>();

  /**
   * Assign a location for an element with the given structural hash
   */
  locate(elementHash: string): Location {
    const count = this.seen.get(elementHash) ?? 0;
    this.seen.set(elementHash, count + 1);
    const key = count === 0 ? elementHash : hashString(`${elementHash}:${count}`);
    return new Location(key);
  }
}
