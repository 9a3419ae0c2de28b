import type { BPlusTreeNodeId, BPlusTreeUnknownNode, NodeArenaHead } from '../types'

export abstract class NodeArena<K, V> {
  /**
   * Minimum degree `t` of the trees created on this arena.
   */
  readonly order: number

  constructor(order: number) {
    this.order = order
  }

  /**
   * The rule for generating node IDs is set.
   * When a new node is created within the tree, the value returned by this method becomes the node's ID.
   * IDs must be stable and must never be reused while the node exists.
   *
   * Throw an `ArenaExhaustedError` when no more nodes can be allocated.
   * The tree then rejects the running insert and keeps its previous state.
   * @param isLeaf This is a flag that indicates whether the node is a leaf node or not.
   */
  abstract id(isLeaf: boolean): BPlusTreeNodeId

  /**
   * Read the stored node from the ID.
   * @param id This is the ID of the node to be read.
   */
  abstract read(id: BPlusTreeNodeId): BPlusTreeUnknownNode<K, V>

  /**
   * It is called when a node is created or updated and needs to be stored.
   * Nodes handed to this method are never mutated by the tree afterwards.
   * @param id This is the ID of the node to be stored.
   * @param node This is the node to be stored.
   */
  abstract write(id: BPlusTreeNodeId, node: BPlusTreeUnknownNode<K, V>): void

  /**
   * Releases a node ID.
   * It is called for every node on tree teardown, and for IDs that were allocated by an insert that failed before they were written.
   * @param id This is the ID of the node to be deleted.
   */
  abstract delete(id: BPlusTreeNodeId): void

  /**
   * It is called when the `init` method of the tree instance is called.
   * If there is no stored head, it should return `null`, and the tree is created with the order of this arena.
   */
  abstract readHead(): NodeArenaHead|null

  /**
   * It is called whenever an insert changes the root, the height or the number of entries.
   * @param head This is the current state of the tree.
   */
  abstract writeHead(head: NodeArenaHead): void

  /**
   * It is called when the tree is destroyed.
   */
  abstract deleteHead(): void
}
