export { VehicleIndex } from './VehicleIndex'
export { SpaceIndex } from './SpaceIndex'
export { ParkingIndexes, createParkingIndexes } from './ParkingIndexes'
export type { VehicleRecord, SpaceRecord, IndexOption, ParkResult } from './types'
export { DEFAULT_INDEX_ORDER, MAX_VEHICLE_NUMBER_LENGTH } from './types'
