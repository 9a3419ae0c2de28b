import {
  ArenaExhaustedError,
  BPlusTree,
  BPlusTreeUnknownNode,
  CorruptedNodeError,
  InMemoryNodeArena,
  NumericComparator,
} from '../src'

describe('failed inserts leave the tree unchanged', () => {
  test('leaf split without room for a new root', () => {
    const arena = new InMemoryNodeArena<number, string>(3, { maxNodes: 2 })
    const tree = new BPlusTree(arena, new NumericComparator())
    tree.init()
    for (let i = 1; i <= 5; i++) {
      expect(tree.insert(i, `v${i}`)).toEqual({ ok: true })
    }

    const result = tree.insert(6, 'v6')
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.reason).toBe('ResourceExhausted')
      expect(result.key).toBe(6)
      expect(result.value).toBe('v6')
    }
    if (!result.ok && result.reason === 'ResourceExhausted') {
      expect(result.error).toBeInstanceOf(ArenaExhaustedError)
    }

    expect(arena.size).toBe(1)
    expect(arena.read('1').keys).toEqual([1, 2, 3, 4, 5])
    expect(tree.getHeight()).toBe(1)
    expect(tree.getSize()).toBe(5)
    expect(tree.search(6)).toBeUndefined()
    expect([...tree.keys()]).toEqual([1, 2, 3, 4, 5])
    expect(() => tree.validate()).not.toThrow()
  })

  test('internal split without room for a new root', () => {
    const arena = new InMemoryNodeArena<number, string>(2, { maxNodes: 7 })
    const tree = new BPlusTree(arena, new NumericComparator())
    tree.init()
    for (let i = 1; i <= 9; i++) {
      expect(tree.insert(i, `v${i}`)).toEqual({ ok: true })
    }
    expect(arena.size).toBe(5)

    const result = tree.insert(10, 'v10')
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.reason).toBe('ResourceExhausted')
    }

    const root = arena.read('3')
    expect(root.keys).toEqual([3, 5, 7])
    if (!root.leaf) {
      expect(root.children).toEqual(['1', '2', '4', '5'])
    }
    const last = arena.read('5')
    expect(last.keys).toEqual([7, 8, 9])
    if (last.leaf) {
      expect(last.next).toBeNull()
    }
    expect(arena.size).toBe(5)
    expect(tree.getRootId()).toBe('3')
    expect(tree.getHeight()).toBe(2)
    expect(tree.getSize()).toBe(9)
    expect(() => tree.validate()).not.toThrow()

    expect(tree.insert(0, 'v0')).toEqual({ ok: true })
    expect([...tree.keys()]).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9])
    expect(() => tree.validate()).not.toThrow()
  })
})

describe('corrupted nodes', () => {
  let arena: InMemoryNodeArena<number, string>
  let tree: BPlusTree<number, string>

  beforeEach(() => {
    arena = new InMemoryNodeArena(3)
    tree = new BPlusTree(arena, new NumericComparator())
    tree.init()
    for (let i = 1; i <= 6; i++) {
      tree.insert(i, `v${i}`)
    }
    // leaves '1' [1, 2, 3] and '2' [4, 5, 6] under root '3'
    arena.delete('2')
    tree.forceUpdate()
  })

  test('search reports a miss on a missing node', () => {
    expect(tree.lookup(5)).toEqual({ found: false, reason: 'CorruptedNode' })
    expect(tree.search(5)).toBeUndefined()
    expect(tree.search(2)).toBe('v2')
  })

  test('insert fails without throwing', () => {
    const result = tree.insert(7, 'v7')
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.reason).toBe('CorruptedNode')
      expect(result.key).toBe(7)
    }
    if (!result.ok && result.reason === 'CorruptedNode') {
      expect(result.error).toBeInstanceOf(CorruptedNodeError)
      expect(result.error).toMatchObject({ nodeId: '2' })
    }
    expect(tree.insert(0, 'v0')).toEqual({ ok: true })
    expect(tree.search(0)).toBe('v0')
  })

  test('scans and validate throw', () => {
    expect(() => [...tree.keys()]).toThrow(CorruptedNodeError)
    expect(() => tree.validate()).toThrow(CorruptedNodeError)
  })
})

describe('malformed nodes', () => {
  class TamperedArena extends InMemoryNodeArena<number, string> {
    tamper(id: string, node: BPlusTreeUnknownNode<number, string>): void {
      this.node.set(id, node)
    }
  }

  test('internal node with a missing child is reported', () => {
    const arena = new TamperedArena(3)
    const tree = new BPlusTree(arena, new NumericComparator())
    tree.init()
    for (let i = 1; i <= 6; i++) {
      tree.insert(i, `v${i}`)
    }
    arena.tamper('3', { id: '3', leaf: false, keys: [4], children: ['1'] })
    tree.forceUpdate()
    expect(tree.lookup(1)).toEqual({ found: false, reason: 'CorruptedNode' })
  })

  test('leaf with unpaired values is reported', () => {
    const arena = new TamperedArena(3)
    const tree = new BPlusTree(arena, new NumericComparator())
    tree.init()
    tree.insert(1, 'v1')
    arena.tamper('1', { id: '1', leaf: true, keys: [1, 2], values: ['v1'], prev: null, next: null })
    tree.forceUpdate()
    expect(tree.lookup(1)).toEqual({ found: false, reason: 'CorruptedNode' })
    const result = tree.insert(3, 'v3')
    expect(result.ok).toBe(false)
  })
})
