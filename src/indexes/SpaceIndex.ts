import { DEFAULT_INDEX_ORDER, IndexOption, SpaceRecord } from './types'
import { BPlusTree } from '../BPlusTree'
import { NumericComparator } from '../base/KeyComparator'
import { TreeStateError } from '../errors'

export class SpaceIndex {
  readonly tree: BPlusTree<number, SpaceRecord>

  constructor(option: IndexOption = {}) {
    this.tree = BPlusTree.create(option.order ?? DEFAULT_INDEX_ORDER, new NumericComparator(), {
      capacity: option.capacity,
    })
  }

  /**
   * Creates the free spaces `1..count`. Spaces already in the index are left as they are.
   * @returns The number of spaces created.
   */
  initialize(count: number): number {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`Space count must be a non-negative integer. but got '${count}'.`)
    }
    let created = 0
    for (let spaceId = 1; spaceId <= count; spaceId++) {
      const result = this.tree.insert(spaceId, { spaceId, occupiedBy: null, occupancyCount: 0 })
      if (result.ok) {
        created++
      }
      else if (result.reason !== 'DuplicateKey') {
        throw result.error
      }
    }
    return created
  }

  get(spaceId: number): SpaceRecord|undefined {
    return this.tree.search(spaceId)
  }

  /**
   * Returns the lowest free space id in `[lo, hi]`, or `null`.
   */
  findFreeSpace(lo: number, hi: number): number|null {
    const found = this.tree.findFirst((_, space) => space.occupiedBy === null, lo, hi)
    return found === null ? null : found[0]
  }

  occupy(spaceId: number, vehicleNumber: string): SpaceRecord {
    const space = this.tree.search(spaceId)
    if (space === undefined) {
      throw new RangeError(`Space ${spaceId} does not exist.`)
    }
    if (space.occupiedBy !== null) {
      throw new TreeStateError(`Space ${spaceId} is already occupied by ${space.occupiedBy}.`)
    }
    space.occupiedBy = vehicleNumber
    space.occupancyCount++
    return space
  }

  /**
   * Marks the space free. The entry itself stays in the index.
   * @returns The vehicle number that occupied the space, or `null`.
   */
  vacate(spaceId: number): string|null {
    const space = this.tree.search(spaceId)
    if (space === undefined) {
      throw new RangeError(`Space ${spaceId} does not exist.`)
    }
    const occupant = space.occupiedBy
    space.occupiedBy = null
    return occupant
  }

  /**
   * Every space in ascending id order.
   */
  all(): Generator<SpaceRecord> {
    return this.tree.values()
  }

  destroy(): void {
    this.tree.destroy()
  }
}
