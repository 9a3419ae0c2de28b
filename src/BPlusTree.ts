import type {
  BPlusTreeCondition,
  BPlusTreeConstructorOption,
  BPlusTreeEntry,
  BPlusTreeLeafNode,
  BPlusTreeNodeId,
  BPlusTreeUnknownNode,
  InsertResult,
  LookupResult,
} from './types'
import { BPlusTreeBase } from './base/BPlusTreeBase'
import { KeyComparator } from './base/KeyComparator'
import { NodeArena } from './base/NodeArena'
import { InMemoryNodeArena } from './InMemoryNodeArena'
import { ArenaExhaustedError, CorruptedNodeError, TreeStateError } from './errors'

const conditionKeys = ['gt', 'gte', 'lt', 'lte', 'equal', 'notEqual'] as const

interface LocatedLeaf<K, V> {
  leaf: BPlusTreeLeafNode<K, V>
  /** IDs of the internal nodes passed on the way down, root first. */
  path: BPlusTreeNodeId[]
}

export class BPlusTree<K, V> extends BPlusTreeBase<K, V> {
  private initialized = false

  protected readonly verifierMap: Record<
    keyof BPlusTreeCondition<K>,
    (nodeKey: K, key: K) => boolean
  > = {
    gt: (nk, k) => this.comparator.isHigher(nk, k),
    gte: (nk, k) => !this.comparator.isLower(nk, k),
    lt: (nk, k) => this.comparator.isLower(nk, k),
    lte: (nk, k) => !this.comparator.isHigher(nk, k),
    equal: (nk, k) => this.comparator.isSame(nk, k),
    notEqual: (nk, k) => !this.comparator.isSame(nk, k),
  }

  /**
   * Conditions that can never match again once they fail, because the scan only moves to higher keys.
   * `equal` is one of them since the scan never starts below its key.
   */
  protected readonly verifierEarlyTerminate: Record<keyof BPlusTreeCondition<K>, boolean> = {
    gt: false,
    gte: false,
    lt: true,
    lte: true,
    equal: true,
    notEqual: false,
  }

  /**
   * Creates and initializes a tree on a new `InMemoryNodeArena`.
   * @param order The minimum degree `t`. Every node holds at most `2t-1` keys.
   * @param comparator The total order of the keys.
   */
  static create<K, V>(
    order: number,
    comparator: KeyComparator<K>,
    option?: BPlusTreeConstructorOption<K, V>
  ): BPlusTree<K, V> {
    const tree = new BPlusTree<K, V>(new InMemoryNodeArena<K, V>(order), comparator, option)
    tree.init()
    return tree
  }

  constructor(
    arena: NodeArena<K, V>,
    comparator: KeyComparator<K>,
    option?: BPlusTreeConstructorOption<K, V>
  ) {
    super(arena, comparator, option)
  }

  init(): void {
    if (this.destroyed) {
      throw new TreeStateError('Tree already destroyed')
    }
    if (this.initialized) {
      throw new TreeStateError('Tree already initialized')
    }
    this.clear()
    const head = this.arena.readHead()
    const order = head === null ? this.arena.order : head.order
    if (!Number.isInteger(order) || order < 2) {
      throw new RangeError(`The 'order' parameter must be an integer greater than 1. but got a '${order}'.`)
    }
    if (head !== null) {
      this.head = head
      this.initialized = true
      return
    }
    try {
      const root = this._createLeaf([], [])
      this._stagedHead = {
        root: root.id,
        firstLeaf: root.id,
        order,
        height: 1,
        size: 0,
      }
      this.commit()
    } catch (err) {
      this.discard()
      throw err
    }
    this.initialized = true
  }

  /**
   * Descends from the root to the leaf that holds, or would hold, the key.
   * In each internal node it follows the child left of the first separator higher than the key.
   */
  protected locate(key: K): LocatedLeaf<K, V> {
    const head = this.currentHead()
    const path: BPlusTreeNodeId[] = []
    let node = this.getNode(head.root)
    while (!node.leaf) {
      path.push(node.id)
      if (path.length >= head.height) {
        throw new CorruptedNodeError(node.id, `internal node below the leaf level ${head.height}`)
      }
      const i = this.binarySearch.upperBound(node.keys, key)
      node = this.getNode(node.children[i])
    }
    if (path.length+1 !== head.height) {
      throw new CorruptedNodeError(node.id, `leaf found at depth ${path.length+1} of ${head.height}`)
    }
    return { leaf: node, path }
  }

  /**
   * Searches for the key and tells whether it is missing or the way to it is broken.
   * @param key The key to search for.
   */
  public lookup(key: K): LookupResult<V> {
    this.readyHead()
    try {
      const { leaf } = this.locate(key)
      const i = this.binarySearch.indexOf(leaf.keys, key)
      if (i === -1) {
        return { found: false, reason: 'NotFound' }
      }
      return { found: true, value: leaf.values[i] }
    } catch (err) {
      if (err instanceof CorruptedNodeError) {
        return { found: false, reason: 'CorruptedNode' }
      }
      throw err
    }
  }

  /**
   * Returns the value stored for the key, or `undefined`.
   * The value is the stored object itself, not a copy.
   * @param key The key to search for.
   */
  public search(key: K): V|undefined {
    const result = this.lookup(key)
    return result.found ? result.value : undefined
  }

  /**
   * It returns whether the key is in the tree.
   * @param key The key to search for.
   */
  public has(key: K): boolean {
    return this.lookup(key).found
  }

  /**
   * You enter the key and value as a pair.
   * If the key is already in the tree nothing changes, and the key and value are returned in the result.
   * If the insert fails for any reason, the tree stays exactly as it was before the call.
   * @param key The key of the pair. This key must be unique.
   * @param value The value of the pair.
   */
  public insert(key: K, value: V): InsertResult<K, V> {
    this.readyHead()
    let located: LocatedLeaf<K, V>
    try {
      located = this.locate(key)
    } catch (err) {
      if (err instanceof CorruptedNodeError) {
        return { ok: false, reason: 'CorruptedNode', key, value, error: err }
      }
      throw err
    }
    const { leaf, path } = located
    if (this.binarySearch.indexOf(leaf.keys, key) !== -1) {
      return { ok: false, reason: 'DuplicateKey', key, value }
    }

    try {
      this._insertAtLeaf(leaf, path, key, value)
      this.stageHead().size++
      this.commit()
    } catch (err) {
      this.discard()
      if (err instanceof ArenaExhaustedError) {
        return { ok: false, reason: 'ResourceExhausted', key, value, error: err }
      }
      if (err instanceof CorruptedNodeError) {
        return { ok: false, reason: 'CorruptedNode', key, value, error: err }
      }
      throw err
    }
    return { ok: true }
  }

  protected _insertAtLeaf(
    leaf: BPlusTreeLeafNode<K, V>,
    path: BPlusTreeNodeId[],
    key: K,
    value: V
  ): void {
    const before = this.stageLeaf(leaf)
    const i = this.binarySearch.lowerBound(before.keys, key)
    before.keys.splice(i, 0, key)
    before.values.splice(i, 0, value)

    if (before.keys.length <= this.maxKeys) {
      return
    }

    const t = this.currentHead().order
    const after = this._createLeaf(
      before.keys.slice(t),
      before.values.slice(t),
      before.id,
      before.next
    )
    before.keys = before.keys.slice(0, t)
    before.values = before.values.slice(0, t)
    if (before.next !== null) {
      const oldNext = this.stageLeaf(this.getLeafNode(before.next))
      oldNext.prev = after.id
    }
    before.next = after.id
    this._insertInParent(before, after.keys[0], after, path)
  }

  /**
   * Puts the separator and the new right sibling of `node` into the parent on top of `path`.
   * An overflowing parent is split around its median, which moves up instead of being copied.
   */
  protected _insertInParent(
    node: BPlusTreeUnknownNode<K, V>,
    separator: K,
    pointer: BPlusTreeUnknownNode<K, V>,
    path: BPlusTreeNodeId[]
  ): void {
    const parentId = path.pop()
    if (parentId === undefined) {
      const head = this.stageHead()
      if (head.root !== node.id) {
        throw new CorruptedNodeError(node.id, `split a node without a parent that is not the root '${head.root}'`)
      }
      const root = this._createInternal([separator], [node.id, pointer.id])
      head.root = root.id
      head.height++
      return
    }

    const parent = this.stageInternal(this.getInternalNode(parentId))
    const nodeIndex = parent.children.indexOf(node.id)
    if (nodeIndex === -1) {
      throw new CorruptedNodeError(parent.id, `child '${node.id}' not found`)
    }
    parent.keys.splice(nodeIndex, 0, separator)
    parent.children.splice(nodeIndex+1, 0, pointer.id)

    if (parent.keys.length <= this.maxKeys) {
      return
    }

    const mid = this.currentHead().order-1
    const midKey = parent.keys[mid]
    const sibling = this._createInternal(
      parent.keys.slice(mid+1),
      parent.children.slice(mid+1)
    )
    parent.keys = parent.keys.slice(0, mid)
    parent.children = parent.children.slice(0, mid+1)
    this._insertInParent(parent, midKey, sibling, path)
  }

  protected *getPairsGenerator(
    startNode: BPlusTreeLeafNode<K, V>,
    startIndex: number
  ): Generator<BPlusTreeEntry<K, V>> {
    let node: BPlusTreeLeafNode<K, V>|null = startNode
    let i = startIndex
    while (node !== null) {
      for (const len = node.keys.length; i < len; i++) {
        yield [node.keys[i], node.values[i]]
      }
      node = node.next === null ? null : this.getLeafNode(node.next)
      i = 0
    }
  }

  /**
   * Walks the leaf chain from the leftmost leaf and yields every entry in ascending key order.
   * Each call starts a new walk. Do not resume the generator after inserting into the tree.
   */
  public *scanAscending(): Generator<BPlusTreeEntry<K, V>> {
    const head = this.readyHead()
    yield* this.getPairsGenerator(this.getLeafNode(head.firstLeaf), 0)
  }

  public *keys(): Generator<K> {
    for (const [key] of this.scanAscending()) {
      yield key
    }
  }

  public *values(): Generator<V> {
    for (const [, value] of this.scanAscending()) {
      yield value
    }
  }

  /**
   * Yields the entries with `lo <= key <= hi` in ascending order.
   * @param lo The lowest key to include.
   * @param hi The highest key to include.
   */
  public scanRange(lo: K, hi: K): Generator<BPlusTreeEntry<K, V>> {
    return this.whereStream({ gte: lo, lte: hi })
  }

  /**
   * Returns the first entry, in ascending key order, that satisfies the predicate, or `null`.
   * When `lo` or `hi` is given, only keys inside the bound are visited.
   * @param predicate The test for each visited entry.
   * @param lo The lowest key to visit.
   * @param hi The highest key to visit.
   */
  public findFirst(
    predicate: (key: K, value: V) => boolean,
    lo?: K,
    hi?: K
  ): BPlusTreeEntry<K, V>|null {
    const condition: BPlusTreeCondition<K> = {}
    if (lo !== undefined) {
      condition.gte = lo
    }
    if (hi !== undefined) {
      condition.lte = hi
    }
    for (const pair of this.whereStream(condition)) {
      if (predicate(pair[0], pair[1])) {
        return pair
      }
    }
    return null
  }

  /**
   * Yields the entries whose key satisfies every condition, in ascending key order.
   * The highest of `gt`, `gte` and `equal` picks the leaf where the walk starts, and the walk ends at the first key past `lt`, `lte` or `equal`.
   * @param condition You can use the `gt`, `gte`, `lt`, `lte`, `equal`, `notEqual` condition statements.
   * @param limit The maximum number of entries to yield.
   */
  public *whereStream(
    condition: BPlusTreeCondition<K>,
    limit?: number
  ): Generator<BPlusTreeEntry<K, V>> {
    const head = this.readyHead()
    const verifiers: [keyof BPlusTreeCondition<K>, K][] = []
    for (const condKey of conditionKeys) {
      const condValue = condition[condKey]
      if (condValue !== undefined) {
        verifiers.push([condKey, condValue])
      }
    }

    let start: { key: K, exclusive: boolean }|null = null
    for (const [condKey, condValue] of verifiers) {
      if (condKey !== 'gt' && condKey !== 'gte' && condKey !== 'equal') {
        continue
      }
      if (
        start === null ||
        this.comparator.isHigher(condValue, start.key) ||
        (condKey === 'gt' && this.comparator.isSame(condValue, start.key))
      ) {
        start = { key: condValue, exclusive: condKey === 'gt' }
      }
    }

    let startNode = this.getLeafNode(head.firstLeaf)
    let startIndex = 0
    if (start !== null) {
      startNode = this.locate(start.key).leaf
      startIndex = start.exclusive
        ? this.binarySearch.upperBound(startNode.keys, start.key)
        : this.binarySearch.lowerBound(startNode.keys, start.key)
    }

    let count = 0
    for (const pair of this.getPairsGenerator(startNode, startIndex)) {
      let isMatch = true
      for (const [condKey, condValue] of verifiers) {
        if (!this.verifierMap[condKey](pair[0], condValue)) {
          if (this.verifierEarlyTerminate[condKey]) {
            return
          }
          isMatch = false
          break
        }
      }
      if (isMatch) {
        yield pair
        count++
        if (limit !== undefined && count >= limit) {
          return
        }
      }
    }
  }

  /**
   * It searches for entries within the tree and returns them in ascending key order.
   * @param condition You can use the `gt`, `gte`, `lt`, `lte`, `equal`, `notEqual` condition statements.
   */
  public where(condition: BPlusTreeCondition<K>): Map<K, V> {
    const map = new Map<K, V>()
    for (const [key, value] of this.whereStream(condition)) {
      map.set(key, value)
    }
    return map
  }

  /**
   * Checks every structural invariant and throws a `CorruptedNodeError` on the first violation.
   * Keys are ordered and within their separators, node sizes are within bounds, all leaves are at the same depth,
   * and the leaf chain visits the leaves left to right.
   */
  public validate(): void {
    const head = this.readyHead()
    const leaves: BPlusTreeNodeId[] = []
    const entries = this._validateNode(head.root, 1, null, null, leaves)
    if (entries !== head.size) {
      throw new CorruptedNodeError(head.root, `tree holds ${entries} entries but the head counts ${head.size}`)
    }
    if (leaves[0] !== head.firstLeaf) {
      throw new CorruptedNodeError(head.firstLeaf, `first leaf should be '${leaves[0]}'`)
    }
    let prev: BPlusTreeLeafNode<K, V>|null = null
    let current: BPlusTreeNodeId|null = head.firstLeaf
    for (const id of leaves) {
      if (current !== id) {
        throw new CorruptedNodeError(id, `leaf chain reached '${current}' instead`)
      }
      const leaf = this.getLeafNode(id)
      if (leaf.prev !== (prev === null ? null : prev.id)) {
        throw new CorruptedNodeError(id, `prev link is '${leaf.prev}'`)
      }
      if (
        prev !== null &&
        prev.keys.length > 0 &&
        leaf.keys.length > 0 &&
        !this.comparator.isHigher(leaf.keys[0], prev.keys[prev.keys.length-1])
      ) {
        throw new CorruptedNodeError(id, 'leaf chain is not strictly ascending')
      }
      prev = leaf
      current = leaf.next
    }
    if (current !== null) {
      throw new CorruptedNodeError(prev === null ? head.root : prev.id, `last leaf links to '${current}'`)
    }
  }

  private _validateNode(
    id: BPlusTreeNodeId,
    depth: number,
    lower: { key: K }|null,
    upper: { key: K }|null,
    leaves: BPlusTreeNodeId[]
  ): number {
    const head = this.readyHead()
    const node = this.getNode(id)
    const isRoot = id === head.root
    const minKeys = isRoot ? (node.leaf ? 0 : 1) : head.order-1
    if (node.keys.length < minKeys || node.keys.length > head.order*2-1) {
      throw new CorruptedNodeError(id, `holds ${node.keys.length} keys`)
    }
    for (let i = 0; i < node.keys.length; i++) {
      const key = node.keys[i]
      if (i > 0 && !this.comparator.isHigher(key, node.keys[i-1])) {
        throw new CorruptedNodeError(id, 'keys are not strictly ascending')
      }
      if (lower !== null && this.comparator.isLower(key, lower.key)) {
        throw new CorruptedNodeError(id, 'key lower than its separator')
      }
      if (upper !== null && !this.comparator.isLower(key, upper.key)) {
        throw new CorruptedNodeError(id, 'key not lower than the next separator')
      }
    }
    if (node.leaf) {
      if (depth !== head.height) {
        throw new CorruptedNodeError(id, `leaf at depth ${depth} of ${head.height}`)
      }
      leaves.push(id)
      return node.keys.length
    }
    let entries = 0
    for (let i = 0; i < node.children.length; i++) {
      const childLower = i === 0 ? lower : { key: node.keys[i-1] }
      const childUpper = i === node.keys.length ? upper : { key: node.keys[i] }
      entries += this._validateNode(node.children[i], depth+1, childLower, childUpper, leaves)
    }
    return entries
  }

  /**
   * Releases the whole tree: every key and value goes through the `disposeKey` and `disposeValue` options,
   * children are deleted from the arena before their parent, and the head last.
   * Every node is read before anything is released, so a corrupted node fails the call and leaves the tree as it was.
   * The tree cannot be used afterwards.
   */
  public destroy(): void {
    const head = this.readyHead()
    const nodes: BPlusTreeUnknownNode<K, V>[] = []
    this._collectNodes(head.root, nodes)

    const { disposeKey, disposeValue } = this.option
    for (const node of nodes) {
      if (node.leaf) {
        for (let i = 0, len = node.keys.length; i < len; i++) {
          disposeKey?.(node.keys[i])
          disposeValue?.(node.values[i])
        }
      }
      this.arena.delete(node.id)
      this.nodes.delete(node.id)
    }
    this.arena.deleteHead()
    this.clear()
    this.head = null
    this.destroyed = true
  }

  /**
   * Pushes the subtree of `id` in post-order: children before their parent, leaves left to right.
   */
  private _collectNodes(id: BPlusTreeNodeId, nodes: BPlusTreeUnknownNode<K, V>[]): void {
    const node = this.getNode(id)
    if (!node.leaf) {
      for (const child of node.children) {
        this._collectNodes(child, nodes)
      }
    }
    nodes.push(node)
  }
}
