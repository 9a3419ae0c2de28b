export abstract class KeyComparator<K> {
  /**
   * Implement an algorithm that sorts keys in ascending order.
   * If it returns a negative number, a is less than b. If it returns 0, the two keys are the same key. If it returns a positive number, a is greater than b.
   * The order must be total: the tree never holds two keys for which this method returns 0.
   * @param a Key a.
   * @param b Key b.
   */
  abstract asc(a: K, b: K): number

  isLower(key: K, than: K): boolean {
    return this.asc(key, than) < 0
  }

  isSame(key: K, than: K): boolean {
    return this.asc(key, than) === 0
  }

  isHigher(key: K, than: K): boolean {
    return this.asc(key, than) > 0
  }
}

export class NumericComparator extends KeyComparator<number> {
  asc(a: number, b: number): number {
    if (Number.isNaN(a) || Number.isNaN(b)) {
      throw new TypeError(`NaN cannot be ordered and is not a valid key.`)
    }
    if (a === b) {
      return 0
    }
    return a < b ? -1 : 1
  }
}

/**
 * Exact, case-sensitive order by UTF-16 code units.
 */
export class StringComparator extends KeyComparator<string> {
  asc(a: string, b: string): number {
    if (a === b) {
      return 0
    }
    return a < b ? -1 : 1
  }
}
