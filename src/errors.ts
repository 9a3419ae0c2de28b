import type { BPlusTreeNodeId } from './types'

export class CorruptedNodeError extends Error {
  readonly nodeId: BPlusTreeNodeId

  constructor(nodeId: BPlusTreeNodeId, message: string) {
    super(`Node '${nodeId}' is corrupted: ${message}`)
    this.name = `CorruptedNodeError`
    this.nodeId = nodeId
  }
}

export class ArenaExhaustedError extends Error {
  readonly limit: number

  constructor(limit: number) {
    super(`The node arena cannot allocate more than ${limit} nodes.`)
    this.name = `ArenaExhaustedError`
    this.limit = limit
  }
}

export class TreeStateError extends Error {
  constructor(message: string) {
    super(message)
    this.name = `TreeStateError`
  }
}
