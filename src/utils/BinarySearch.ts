import { KeyComparator } from '../base/KeyComparator'

export class BinarySearch<T> {
  protected readonly comparator: KeyComparator<T>

  constructor(comparator: KeyComparator<T>) {
    this.comparator = comparator
  }

  /**
   * Returns the index of the element that is the same as `value`, or `-1`.
   */
  indexOf(array: T[], value: T): number {
    const i = this.lowerBound(array, value)
    if (i < array.length && this.comparator.isSame(array[i], value)) {
      return i
    }
    return -1
  }

  /**
   * Returns the smallest index whose element is not lower than `value`.
   * This is where `value` would be inserted to keep the array ascending.
   */
  lowerBound(array: T[], value: T, left = 0, right = array.length): number {
    while (left < right) {
      const mid = Math.floor((left+right)/2)
      if (this.comparator.isLower(array[mid], value)) {
        left = mid+1
      }
      else {
        right = mid
      }
    }
    return left
  }

  /**
   * Returns the smallest index whose element is higher than `value`.
   * In an internal node it is the index of the child to descend into.
   */
  upperBound(array: T[], value: T, left = 0, right = array.length): number {
    while (left < right) {
      const mid = Math.floor((left+right)/2)
      if (this.comparator.isHigher(array[mid], value)) {
        right = mid
      }
      else {
        left = mid+1
      }
    }
    return left
  }
}
