import type { BPlusTreeNodeId, BPlusTreeUnknownNode, NodeArenaHead } from './types'
import { NodeArena } from './base/NodeArena'
import { ArenaExhaustedError } from './errors'

export interface InMemoryNodeArenaOption {
  /**
   * The maximum number of nodes the arena holds, counting the IDs allocated but not yet written.
   * If not specified, the arena is unbounded.
   */
  maxNodes?: number
}

export class InMemoryNodeArena<K, V> extends NodeArena<K, V> {
  protected readonly node: Map<BPlusTreeNodeId, BPlusTreeUnknownNode<K, V>>
  protected readonly pending: Set<BPlusTreeNodeId>
  protected readonly maxNodes: number
  protected head: NodeArenaHead|null
  protected index: number

  constructor(order: number, option: InMemoryNodeArenaOption = {}) {
    super(order)
    this.node = new Map()
    this.pending = new Set()
    this.maxNodes = option.maxNodes ?? Infinity
    this.head = null
    this.index = 1
  }

  /**
   * The number of nodes stored or allocated.
   */
  get size(): number {
    return this.node.size+this.pending.size
  }

  id(isLeaf: boolean): BPlusTreeNodeId {
    if (this.size >= this.maxNodes) {
      throw new ArenaExhaustedError(this.maxNodes)
    }
    const id = (this.index++).toString()
    this.pending.add(id)
    return id
  }

  read(id: BPlusTreeNodeId): BPlusTreeUnknownNode<K, V> {
    const node = this.node.get(id)
    if (node === undefined) {
      throw new Error(`The tree attempted to reference node '${id}', but couldn't find the corresponding node.`)
    }
    return node
  }

  write(id: BPlusTreeNodeId, node: BPlusTreeUnknownNode<K, V>): void {
    this.pending.delete(id)
    this.node.set(id, node)
  }

  delete(id: BPlusTreeNodeId): void {
    this.pending.delete(id)
    this.node.delete(id)
  }

  readHead(): NodeArenaHead|null {
    return this.head
  }

  writeHead(head: NodeArenaHead): void {
    this.head = head
  }

  deleteHead(): void {
    this.head = null
  }
}
