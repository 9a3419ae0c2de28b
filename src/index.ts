export type {
  BPlusTreeNodeId,
  BPlusTreeNode,
  BPlusTreeInternalNode,
  BPlusTreeLeafNode,
  BPlusTreeUnknownNode,
  BPlusTreeConstructorOption,
  BPlusTreeCondition,
  BPlusTreeEntry,
  NodeArenaHead,
  InsertFailureReason,
  InsertResult,
  LookupResult,
} from './types'
export { BPlusTree } from './BPlusTree'
export { BPlusTreeBase } from './base/BPlusTreeBase'
export { NodeArena } from './base/NodeArena'
export { InMemoryNodeArena } from './InMemoryNodeArena'
export type { InMemoryNodeArenaOption } from './InMemoryNodeArena'
export { KeyComparator, NumericComparator, StringComparator } from './base/KeyComparator'
export { CorruptedNodeError, ArenaExhaustedError, TreeStateError } from './errors'
export * from './indexes'
