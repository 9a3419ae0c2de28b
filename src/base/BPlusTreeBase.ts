import type {
  BPlusTreeConstructorOption,
  BPlusTreeInternalNode,
  BPlusTreeLeafNode,
  BPlusTreeNodeId,
  BPlusTreeUnknownNode,
  NodeArenaHead,
} from '../types'
import { CacheEntanglementSync } from 'cache-entanglement'
import { BinarySearch } from '../utils/BinarySearch'
import { CorruptedNodeError, TreeStateError } from '../errors'
import { KeyComparator } from './KeyComparator'
import { NodeArena } from './NodeArena'

export abstract class BPlusTreeBase<K, V> {
  protected readonly arena: NodeArena<K, V>
  protected readonly comparator: KeyComparator<K>
  protected readonly option: BPlusTreeConstructorOption<K, V>
  protected readonly binarySearch: BinarySearch<K>
  protected readonly nodes: ReturnType<typeof this._createCachedNode>

  protected readonly _nodeCreateBuffer: Map<BPlusTreeNodeId, BPlusTreeUnknownNode<K, V>>
  protected readonly _nodeUpdateBuffer: Map<BPlusTreeNodeId, BPlusTreeUnknownNode<K, V>>
  protected _stagedHead: NodeArenaHead|null
  protected head: NodeArenaHead|null
  protected destroyed: boolean

  protected constructor(
    arena: NodeArena<K, V>,
    comparator: KeyComparator<K>,
    option?: BPlusTreeConstructorOption<K, V>
  ) {
    this.arena = arena
    this.comparator = comparator
    this.option = option ?? {}
    this.binarySearch = new BinarySearch(comparator)
    this.nodes = this._createCachedNode()
    this._nodeCreateBuffer = new Map()
    this._nodeUpdateBuffer = new Map()
    this._stagedHead = null
    this.head = null
    this.destroyed = false
  }

  private _createCachedNode() {
    return new CacheEntanglementSync((key) => {
      return this.arena.read(key)
    }, {
      capacity: this.option.capacity ?? 1000
    })
  }

  /**
   * After creating a tree instance, it must be called.
   * It creates the root leaf on an empty arena, or recovers the tree already stored in it.
   */
  abstract init(): void

  /**
   * Returns the ID of the root node.
   */
  public getRootId(): BPlusTreeNodeId {
    return this.readyHead().root
  }

  /**
   * Returns the minimum degree `t` of the tree.
   */
  public getOrder(): number {
    return this.readyHead().order
  }

  /**
   * Returns the number of levels, counting the leaf level.
   */
  public getHeight(): number {
    return this.readyHead().height
  }

  /**
   * Returns the number of entries stored in the tree.
   */
  public getSize(): number {
    return this.readyHead().size
  }

  protected get maxKeys(): number {
    return this.currentHead().order*2-1
  }

  protected readyHead(): NodeArenaHead {
    if (this.destroyed) {
      throw new TreeStateError('Tree already destroyed')
    }
    if (this.head === null) {
      throw new TreeStateError('Tree is not initialized. Call init() first.')
    }
    return this.head
  }

  /**
   * The head as the running insert sees it.
   */
  protected currentHead(): NodeArenaHead {
    return this._stagedHead ?? this.readyHead()
  }

  protected stageHead(): NodeArenaHead {
    if (this._stagedHead === null) {
      this._stagedHead = { ...this.readyHead() }
    }
    return this._stagedHead
  }

  protected getNode(id: BPlusTreeNodeId): BPlusTreeUnknownNode<K, V> {
    const buffered = this._nodeCreateBuffer.get(id) ?? this._nodeUpdateBuffer.get(id)
    if (buffered) {
      return buffered
    }
    let node: BPlusTreeUnknownNode<K, V>
    try {
      node = this.nodes.cache(id).raw
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      throw new CorruptedNodeError(id, `unreadable (${reason})`)
    }
    this.assertNodeShape(id, node)
    return node
  }

  protected getLeafNode(id: BPlusTreeNodeId): BPlusTreeLeafNode<K, V> {
    const node = this.getNode(id)
    if (!node.leaf) {
      throw new CorruptedNodeError(id, 'expected a leaf node')
    }
    return node
  }

  protected getInternalNode(id: BPlusTreeNodeId): BPlusTreeInternalNode<K> {
    const node = this.getNode(id)
    if (node.leaf) {
      throw new CorruptedNodeError(id, 'expected an internal node')
    }
    return node
  }

  private assertNodeShape(id: BPlusTreeNodeId, node: BPlusTreeUnknownNode<K, V>|null|undefined): void {
    if (!node || node.id !== id || !Array.isArray(node.keys)) {
      throw new CorruptedNodeError(id, 'missing keys')
    }
    if (node.leaf) {
      if (!Array.isArray(node.values) || node.values.length !== node.keys.length) {
        throw new CorruptedNodeError(id, 'keys and values are not paired')
      }
    }
    else if (!Array.isArray(node.children) || node.children.length !== node.keys.length+1) {
      throw new CorruptedNodeError(id, 'child count does not match key count')
    }
  }

  protected _createNodeId(isLeaf: boolean): BPlusTreeNodeId {
    const id = this.arena.id(isLeaf)
    if (this._nodeCreateBuffer.has(id) || this._nodeUpdateBuffer.has(id)) {
      throw new TreeStateError(`The arena returned the node id '${id}' which is already in use.`)
    }
    return id
  }

  protected _createLeaf(
    keys: K[],
    values: V[],
    prev: BPlusTreeNodeId|null = null,
    next: BPlusTreeNodeId|null = null
  ): BPlusTreeLeafNode<K, V> {
    const node: BPlusTreeLeafNode<K, V> = {
      id: this._createNodeId(true),
      leaf: true,
      keys,
      values,
      prev,
      next,
    }
    this._nodeCreateBuffer.set(node.id, node)
    return node
  }

  protected _createInternal(keys: K[], children: BPlusTreeNodeId[]): BPlusTreeInternalNode<K> {
    const node: BPlusTreeInternalNode<K> = {
      id: this._createNodeId(false),
      leaf: false,
      keys,
      children,
    }
    this._nodeCreateBuffer.set(node.id, node)
    return node
  }

  /**
   * Returns a copy of the leaf that the running insert may mutate.
   * The stored node stays untouched until `commit`.
   */
  protected stageLeaf(node: BPlusTreeLeafNode<K, V>): BPlusTreeLeafNode<K, V> {
    const buffered = this._nodeCreateBuffer.get(node.id) ?? this._nodeUpdateBuffer.get(node.id)
    if (buffered && buffered.leaf) {
      return buffered
    }
    const copy: BPlusTreeLeafNode<K, V> = {
      id: node.id,
      leaf: true,
      keys: [...node.keys],
      values: [...node.values],
      prev: node.prev,
      next: node.next,
    }
    this._nodeUpdateBuffer.set(copy.id, copy)
    return copy
  }

  protected stageInternal(node: BPlusTreeInternalNode<K>): BPlusTreeInternalNode<K> {
    const buffered = this._nodeCreateBuffer.get(node.id) ?? this._nodeUpdateBuffer.get(node.id)
    if (buffered && !buffered.leaf) {
      return buffered
    }
    const copy: BPlusTreeInternalNode<K> = {
      id: node.id,
      leaf: false,
      keys: [...node.keys],
      children: [...node.children],
    }
    this._nodeUpdateBuffer.set(copy.id, copy)
    return copy
  }

  protected commit(): void {
    for (const node of this._nodeCreateBuffer.values()) {
      this.arena.write(node.id, node)
    }
    for (const node of this._nodeUpdateBuffer.values()) {
      this.arena.write(node.id, node)
      this.nodes.delete(node.id)
    }
    if (this._stagedHead !== null) {
      this.arena.writeHead(this._stagedHead)
      this.head = this._stagedHead
    }
    this._nodeCreateBuffer.clear()
    this._nodeUpdateBuffer.clear()
    this._stagedHead = null
  }

  /**
   * Drops every staged change and gives the allocated IDs back to the arena.
   */
  protected discard(): void {
    for (const id of this._nodeCreateBuffer.keys()) {
      this.arena.delete(id)
    }
    this._nodeCreateBuffer.clear()
    this._nodeUpdateBuffer.clear()
    this._stagedHead = null
  }

  /**
   * This method deletes nodes cached in-memory and reloads the head from the arena.
   * Typically, there's no need to use this method, but it can be used when the arena was changed outside of this tree instance.
   * If you specify an ID, only that node is evicted.
   * @param id The ID of the node to evict.
   */
  public forceUpdate(id?: BPlusTreeNodeId): void {
    this.readyHead()
    if (id !== undefined) {
      this.nodes.delete(id)
      return
    }
    this.nodes.clear()
    const head = this.arena.readHead()
    if (head === null) {
      throw new TreeStateError('The arena no longer holds a tree head.')
    }
    this.head = head
  }

  /**
   * Clears all cached nodes.
   */
  clear(): void {
    this.nodes.clear()
  }
}
