export type BPlusTreeNodeId = string

export type BPlusTreeUnknownNode<K, V> = BPlusTreeInternalNode<K>|BPlusTreeLeafNode<K, V>

export interface BPlusTreeNode<K> {
  id: BPlusTreeNodeId
  leaf: boolean
  keys: K[]
}

export interface BPlusTreeInternalNode<K> extends BPlusTreeNode<K> {
  leaf: false
  /** `keys.length+1` child ids. Child `i` holds the keys lower than `keys[i]`. */
  children: BPlusTreeNodeId[]
}

export interface BPlusTreeLeafNode<K, V> extends BPlusTreeNode<K> {
  leaf: true
  values: V[]
  prev: BPlusTreeNodeId|null
  next: BPlusTreeNodeId|null
}

export interface NodeArenaHead {
  root: BPlusTreeNodeId
  /** The leftmost leaf, where every ascending scan starts. */
  firstLeaf: BPlusTreeNodeId
  /** Minimum degree `t`. A node holds at most `2t-1` keys. */
  order: number
  height: number
  size: number
}

export interface BPlusTreeConstructorOption<K, V> {
  /**
   * The capacity of the cache.
   * This value is used to determine how many nodes can be cached.
   * If not specified, the default value is 1000.
   */
  capacity?: number
  /**
   * Called once for every stored key when the tree is destroyed.
   */
  disposeKey?: (key: K) => void
  /**
   * Called once for every stored value when the tree is destroyed.
   */
  disposeValue?: (value: V) => void
}

export type BPlusTreeCondition<K> = Partial<{
  /** Searches for entries whose key is greater than the given key. */
  gt: K
  /** Searches for entries whose key is greater than or equal to the given key. */
  gte: K
  /** Searches for entries whose key is less than the given key. */
  lt: K
  /** Searches for entries whose key is less than or equal to the given key. */
  lte: K
  /** Searches for the entry whose key equals the given key. */
  equal: K
  /** Searches for entries whose key differs from the given key. */
  notEqual: K
}>

export type BPlusTreeEntry<K, V> = [K, V]

export type InsertFailureReason = 'DuplicateKey'|'ResourceExhausted'|'CorruptedNode'

/**
 * A rejected insert gives the key and value back to the caller.
 */
export type InsertResult<K, V> =
  | { ok: true }
  | { ok: false, reason: 'DuplicateKey', key: K, value: V }
  | { ok: false, reason: 'ResourceExhausted'|'CorruptedNode', key: K, value: V, error: Error }

export type LookupResult<V> =
  | { found: true, value: V }
  | { found: false, reason: 'NotFound'|'CorruptedNode' }
