import { IndexOption, ParkResult } from './types'
import { VehicleIndex } from './VehicleIndex'
import { SpaceIndex } from './SpaceIndex'

export class ParkingIndexes {
  readonly vehicles: VehicleIndex
  readonly spaces: SpaceIndex

  constructor(option: IndexOption = {}) {
    this.vehicles = new VehicleIndex(option)
    this.spaces = new SpaceIndex(option)
  }

  /**
   * Parks a registered vehicle in the lowest free space of `[lo, hi]`.
   */
  park(vehicleNumber: string, lo: number, hi: number, now: Date = new Date()): ParkResult {
    const vehicle = this.vehicles.get(vehicleNumber)
    if (vehicle === undefined) {
      return { ok: false, reason: 'UnknownVehicle' }
    }
    if (vehicle.spaceId !== null) {
      return { ok: false, reason: 'AlreadyParked' }
    }
    const spaceId = this.spaces.findFreeSpace(lo, hi)
    if (spaceId === null) {
      return { ok: false, reason: 'NoFreeSpace' }
    }
    this.spaces.occupy(spaceId, vehicleNumber)
    vehicle.spaceId = spaceId
    vehicle.arrivedAt = now
    return { ok: true, spaceId }
  }

  /**
   * Frees the space of a parked vehicle. Both records stay in their indexes.
   * @returns The freed space id, or `null` when the vehicle is unknown or not parked.
   */
  release(vehicleNumber: string): number|null {
    const vehicle = this.vehicles.get(vehicleNumber)
    if (vehicle === undefined || vehicle.spaceId === null) {
      return null
    }
    const spaceId = vehicle.spaceId
    this.spaces.vacate(spaceId)
    vehicle.spaceId = null
    vehicle.arrivedAt = null
    return spaceId
  }

  destroy(): void {
    this.vehicles.destroy()
    this.spaces.destroy()
  }
}

export function createParkingIndexes(option: IndexOption = {}): ParkingIndexes {
  return new ParkingIndexes(option)
}
