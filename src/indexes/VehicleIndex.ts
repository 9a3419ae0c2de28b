import type { InsertResult } from '../types'
import { DEFAULT_INDEX_ORDER, IndexOption, MAX_VEHICLE_NUMBER_LENGTH, VehicleRecord } from './types'
import { BPlusTree } from '../BPlusTree'
import { StringComparator } from '../base/KeyComparator'

/**
 * Vehicles keyed by their number, compared exactly and case-sensitively.
 */
export class VehicleIndex {
  readonly tree: BPlusTree<string, VehicleRecord>

  constructor(option: IndexOption = {}) {
    this.tree = BPlusTree.create(option.order ?? DEFAULT_INDEX_ORDER, new StringComparator(), {
      capacity: option.capacity,
    })
  }

  /**
   * Adds a vehicle that is not parked.
   * The vehicle number must take 1 to `MAX_VEHICLE_NUMBER_LENGTH` bytes in UTF-8.
   * A vehicle number already in the index is rejected with `DuplicateKey`, and the stored record is kept.
   */
  register(vehicleNumber: string, ownerName: string): InsertResult<string, VehicleRecord> {
    const bytes = Buffer.byteLength(vehicleNumber, 'utf8')
    if (bytes === 0 || bytes > MAX_VEHICLE_NUMBER_LENGTH) {
      throw new RangeError(`Vehicle number must be 1 to ${MAX_VEHICLE_NUMBER_LENGTH} bytes in UTF-8. but got '${vehicleNumber}' (${bytes} bytes).`)
    }
    return this.tree.insert(vehicleNumber, {
      vehicleNumber,
      ownerName,
      spaceId: null,
      arrivedAt: null,
    })
  }

  get(vehicleNumber: string): VehicleRecord|undefined {
    return this.tree.search(vehicleNumber)
  }

  /**
   * Every vehicle in ascending vehicle number order.
   */
  all(): Generator<VehicleRecord> {
    return this.tree.values()
  }

  *parked(): Generator<VehicleRecord> {
    for (const vehicle of this.tree.values()) {
      if (vehicle.spaceId !== null) {
        yield vehicle
      }
    }
  }

  destroy(): void {
    this.tree.destroy()
  }
}
