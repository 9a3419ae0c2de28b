import {
  ArenaExhaustedError,
  BPlusTree,
  CorruptedNodeError,
  InMemoryNodeArena,
  NumericComparator,
  TreeStateError,
} from '../src'

describe('lifecycle', () => {
  test('use before init', () => {
    const tree = new BPlusTree<number, string>(new InMemoryNodeArena(3), new NumericComparator())
    expect(() => tree.search(1)).toThrow(TreeStateError)
    expect(() => tree.insert(1, 'v1')).toThrow('Tree is not initialized. Call init() first.')
    expect(() => tree.getSize()).toThrow(TreeStateError)
  })

  test('init twice', () => {
    const tree = new BPlusTree<number, string>(new InMemoryNodeArena(3), new NumericComparator())
    tree.init()
    expect(() => tree.init()).toThrow('Tree already initialized')
  })

  test('order below 2 is rejected', () => {
    const tree = new BPlusTree<number, string>(new InMemoryNodeArena(1), new NumericComparator())
    expect(() => tree.init()).toThrow(RangeError)
    expect(() => BPlusTree.create(2.5, new NumericComparator())).toThrow(RangeError)
  })

  test('new tree has one empty root leaf', () => {
    const arena = new InMemoryNodeArena<number, string>(3)
    const tree = new BPlusTree(arena, new NumericComparator())
    tree.init()
    expect(arena.size).toBe(1)
    expect(tree.getRootId()).toBe('1')
    expect(tree.getOrder()).toBe(3)
    expect(tree.getHeight()).toBe(1)
    expect(tree.getSize()).toBe(0)
    expect(arena.readHead()).toEqual({ root: '1', firstLeaf: '1', order: 3, height: 1, size: 0 })
  })

  test('init fails when the arena cannot hold the root', () => {
    const arena = new InMemoryNodeArena<number, string>(3, { maxNodes: 0 })
    const tree = new BPlusTree(arena, new NumericComparator())
    expect(() => tree.init()).toThrow(ArenaExhaustedError)
    expect(arena.size).toBe(0)
    expect(arena.readHead()).toBeNull()
  })

  test('reopen a tree stored in the arena', () => {
    const arena = new InMemoryNodeArena<number, string>(2)
    const first = new BPlusTree(arena, new NumericComparator())
    first.init()
    for (let i = 1; i <= 20; i++) {
      first.insert(i, `v${i}`)
    }

    const second = new BPlusTree(arena, new NumericComparator())
    second.init()
    expect(second.getSize()).toBe(20)
    expect(second.getRootId()).toBe(first.getRootId())
    expect([...second.keys()]).toEqual([...first.keys()])
    expect(() => second.validate()).not.toThrow()

    expect(second.insert(21, 'v21')).toEqual({ ok: true })
    expect(first.getSize()).toBe(20)
    first.forceUpdate()
    expect(first.getSize()).toBe(21)
    expect(first.search(21)).toBe('v21')
    expect(() => first.validate()).not.toThrow()
  })

  test('destroy releases every key and value, then the nodes', () => {
    const disposedKeys: number[] = []
    const disposedValues: string[] = []
    const arena = new InMemoryNodeArena<number, string>(2)
    const tree = new BPlusTree(arena, new NumericComparator(), {
      disposeKey: (key) => disposedKeys.push(key),
      disposeValue: (value) => disposedValues.push(value),
    })
    tree.init()
    for (let i = 10; i >= 1; i--) {
      tree.insert(i, `v${i}`)
    }
    tree.destroy()

    expect(disposedKeys).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10])
    expect(disposedValues).toEqual(['v1', 'v2', 'v3', 'v4', 'v5', 'v6', 'v7', 'v8', 'v9', 'v10'])
    expect(arena.size).toBe(0)
    expect(arena.readHead()).toBeNull()
    expect(() => tree.search(1)).toThrow('Tree already destroyed')
    expect(() => tree.init()).toThrow('Tree already destroyed')
    expect(() => tree.destroy()).toThrow(TreeStateError)
  })

  test('destroy an empty tree', () => {
    const disposeKey = jest.fn()
    const arena = new InMemoryNodeArena<number, string>(3)
    const tree = new BPlusTree(arena, new NumericComparator(), { disposeKey })
    tree.init()
    tree.destroy()
    expect(disposeKey).not.toHaveBeenCalled()
    expect(arena.size).toBe(0)
  })

  test('rejected values are not disposed', () => {
    const disposeValue = jest.fn()
    const tree = BPlusTree.create<number, string>(3, new NumericComparator(), { disposeValue })
    tree.insert(1, 'kept')
    const result = tree.insert(1, 'rejected')
    expect(result).toEqual({ ok: false, reason: 'DuplicateKey', key: 1, value: 'rejected' })
    tree.destroy()
    expect(disposeValue).toHaveBeenCalledTimes(1)
    expect(disposeValue).toHaveBeenCalledWith('kept')
  })

  test('small node cache', () => {
    const tree = BPlusTree.create<number, number>(2, new NumericComparator(), { capacity: 2 })
    for (let i = 0; i < 300; i++) {
      tree.insert((i*37)%300, i)
    }
    expect(tree.getSize()).toBe(300)
    expect([...tree.keys()]).toEqual(Array.from({ length: 300 }, (_, i) => i))
    expect(tree.search(37)).toBe(1)
    expect(() => tree.validate()).not.toThrow()
  })

  test('destroy with a missing node releases nothing', () => {
    const disposedKeys: number[] = []
    const arena = new InMemoryNodeArena<number, string>(3)
    const tree = new BPlusTree(arena, new NumericComparator(), {
      disposeKey: (key) => disposedKeys.push(key),
    })
    tree.init()
    for (let i = 1; i <= 6; i++) {
      tree.insert(i, `v${i}`)
    }
    // leaves '1' [1, 2, 3] and '2' [4, 5, 6] under root '3'
    arena.delete('2')
    tree.forceUpdate()

    expect(() => tree.destroy()).toThrow(CorruptedNodeError)
    expect(disposedKeys).toEqual([])
    expect(arena.size).toBe(2)
    expect(arena.readHead()).toEqual({ root: '3', firstLeaf: '1', order: 3, height: 2, size: 6 })
    expect(tree.search(2)).toBe('v2')
    expect(() => tree.destroy()).toThrow(CorruptedNodeError)
    expect(disposedKeys).toEqual([])
  })
})
