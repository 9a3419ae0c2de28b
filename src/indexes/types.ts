export interface VehicleRecord {
  vehicleNumber: string
  ownerName: string
  /** The space the vehicle is parked in, `null` when it is not parked. */
  spaceId: number|null
  arrivedAt: Date|null
}

export interface SpaceRecord {
  spaceId: number
  /** Vehicle number of the occupant, `null` when the space is free. */
  occupiedBy: string|null
  occupancyCount: number
}

export interface IndexOption {
  /**
   * Minimum degree of the underlying tree.
   * If not specified, the default value is 3.
   */
  order?: number
  /**
   * Node cache capacity of the underlying tree.
   */
  capacity?: number
}

export type ParkResult =
  | { ok: true, spaceId: number }
  | { ok: false, reason: 'UnknownVehicle'|'AlreadyParked'|'NoFreeSpace' }

export const DEFAULT_INDEX_ORDER = 3
/** In UTF-8 bytes. */
export const MAX_VEHICLE_NUMBER_LENGTH = 14
