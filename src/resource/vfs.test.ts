/**
 * VfsResource Tests
 *
 * Runs against an in-memory virtual filesystem adapter.
 */

import { describe, it, expect, vi } from 'vitest'
import { Readable } from 'node:stream'
import { Errors } from '../errors/index.js'
import { readText } from './streams.js'
import { VfsResource, type VfsAdapter } from './vfs.js'

/**
 * Native handle of the in-memory filesystem
 */
class MemoryNode {
  constructor(
    readonly path: string,
    readonly content?: string
  ) {}

  toString(): string {
    return `memory:///${this.path}`
  }
}

function createMemoryVfs(files: Record<string, string>) {
  const nodes = new Map<string, MemoryNode>()
  for (const [path, content] of Object.entries(files)) {
    nodes.set(path, new MemoryNode(path, content))
    for (let i = path.indexOf('/'); i !== -1; i = path.indexOf('/', i + 1)) {
      const dir = path.slice(0, i)
      if (!nodes.has(dir)) nodes.set(dir, new MemoryNode(dir))
    }
  }

  function lookup(path: string): MemoryNode {
    const node = nodes.get(path)
    if (!node) throw new Error(`no such node: ${path}`)
    return node
  }

  const adapter: VfsAdapter<MemoryNode> = {
    openStream: async (node) => Readable.from([Buffer.from(lookup(node.path).content ?? '')]),
    exists: async (node) => nodes.has(node.path),
    isReadable: async (node) => nodes.get(node.path)?.content !== undefined,
    getURL: (node) => new URL(node.toString()),
    getURI: (node) => node.toString(),
    getFile: (node) => `/mnt/memory/${node.path}`,
    getSize: async (node) => Buffer.byteLength(lookup(node.path).content ?? ''),
    getLastModified: async () => 1_700_000_000_000,
    getChild: (node, path) => lookup(`${node.path}/${path}`),
    getRelative: (url) => lookup(url.pathname.slice(1)),
    getName: (node) => node.path.slice(node.path.lastIndexOf('/') + 1),
  }

  return { adapter, lookup }
}

describe('VfsResource', () => {
  const { adapter, lookup } = createMemoryVfs({
    'app/main.yml': 'main: true',
    'app/conf/db.yml': 'db: true',
    'app/other.yml': 'other: true',
  })

  describe('delegation', () => {
    const resource = new VfsResource(lookup('app/main.yml'), adapter)

    it('should delegate content operations to the adapter', async () => {
      await expect(resource.exists()).resolves.toBe(true)
      await expect(resource.isReadable()).resolves.toBe(true)
      await expect(resource.contentLength()).resolves.toBe(10)
      await expect(resource.lastModified()).resolves.toBe(1_700_000_000_000)
      await expect(readText(resource)).resolves.toBe('main: true')
    })

    it('should delegate descriptor operations to the adapter', () => {
      expect(resource.getURL().href).toBe('memory:///app/main.yml')
      expect(resource.getURI()).toBe('memory:///app/main.yml')
      expect(resource.getFile()).toBe('/mnt/memory/app/main.yml')
      expect(resource.getFilename()).toBe('main.yml')
      expect(resource.getDescription()).toBe('VFS resource [memory:///app/main.yml]')
    })

    it('should reject a missing handle', () => {
      const inert: VfsAdapter<null> = {
        openStream: async () => Readable.from([]),
        exists: async () => false,
        isReadable: async () => false,
        getURL: () => new URL('memory:///'),
        getURI: () => 'memory:///',
        getFile: () => '/',
        getSize: async () => 0,
        getLastModified: async () => 0,
        getChild: () => null,
        getRelative: () => null,
        getName: () => '',
      }

      expect(() => new VfsResource(null, inert)).toThrow(
        'handle: virtual file handle must not be null'
      )
    })
  })

  describe('equality', () => {
    it('should be equal over the same native handle', () => {
      const node = lookup('app/main.yml')
      const first = new VfsResource(node, adapter)
      const second = new VfsResource(node, adapter)

      expect(first.equals(second)).toBe(true)
      expect(first.hashCode()).toBe(second.hashCode())
    })

    it('should follow handle identity rather than description', () => {
      const first = new VfsResource(new MemoryNode('app/main.yml'), adapter)
      const second = new VfsResource(new MemoryNode('app/main.yml'), adapter)

      expect(first.getDescription()).toBe(second.getDescription())
      expect(first.equals(second)).toBe(false)
    })

    it('should compare handles regardless of the adapter instance', () => {
      const node = lookup('app/main.yml')
      const first = new VfsResource(node, adapter)
      const second = new VfsResource(node, { ...adapter })

      expect(first.equals(second)).toBe(true)
      expect(second.equals(first)).toBe(true)
      expect(first.hashCode()).toBe(second.hashCode())
    })

    it('should use the adapter identity when provided', () => {
      const byPath: VfsAdapter<MemoryNode> = {
        ...adapter,
        isSame: (a, b) => a.path === b.path,
      }
      const first = new VfsResource(new MemoryNode('app/main.yml'), byPath)
      const second = new VfsResource(new MemoryNode('app/main.yml'), byPath)

      expect(first.equals(second)).toBe(true)
      expect(first.hashCode()).toBe(second.hashCode())
    })
  })

  describe('createRelative', () => {
    it('should look up nested paths as children', async () => {
      const getChild = vi.fn(adapter.getChild)
      const getRelative = vi.fn(adapter.getRelative)
      const spied: VfsAdapter<MemoryNode> = { ...adapter, getChild, getRelative }

      const relative = new VfsResource(lookup('app'), spied).createRelative('conf/db.yml')

      expect(getChild).toHaveBeenCalledTimes(1)
      expect(getRelative).not.toHaveBeenCalled()
      expect(relative.equals(new VfsResource(lookup('app/conf/db.yml'), spied))).toBe(true)
      await expect(readText(relative)).resolves.toBe('db: true')
    })

    it('should fall back to URL resolution when the child lookup fails', async () => {
      const getChild = vi.fn(adapter.getChild)
      const getRelative = vi.fn(adapter.getRelative)
      const spied: VfsAdapter<MemoryNode> = { ...adapter, getChild, getRelative }

      // a file has no children: memory:///app/main.yml/conf/db.yml does not exist
      const relative = new VfsResource(lookup('app/main.yml'), spied).createRelative('conf/db.yml')

      expect(getChild).toHaveBeenCalledTimes(1)
      expect(getRelative).toHaveBeenCalledTimes(1)
      expect(getRelative.mock.results[0]?.value).toBe(lookup('app/conf/db.yml'))
      await expect(readText(relative)).resolves.toBe('db: true')
    })

    it('should resolve plain and dot paths through URLs', async () => {
      const getChild = vi.fn(adapter.getChild)
      const spied: VfsAdapter<MemoryNode> = { ...adapter, getChild }
      const resource = new VfsResource(lookup('app/conf/db.yml'), spied)

      await expect(readText(resource.createRelative('../other.yml'))).resolves.toBe('other: true')
      await expect(readText(resource.createRelative('./db.yml'))).resolves.toBe('db: true')
      expect(getChild).not.toHaveBeenCalled()
    })
  })

  describe('errors', () => {
    it('should wrap provider failures and keep the cause', () => {
      const cause = new Error('provider offline')
      const broken: VfsAdapter<MemoryNode> = {
        ...adapter,
        getURL: () => {
          throw cause
        },
      }
      const resource = new VfsResource(lookup('app/main.yml'), broken)

      let error: unknown
      try {
        resource.getURL()
      } catch (thrown) {
        error = thrown
      }
      expect(error).toMatchObject({
        code: 'ADAPTER_FAILURE',
        message: 'Failed to obtain URL for VFS resource [memory:///app/main.yml]: provider offline',
      })
      expect(error instanceof Error && error.cause).toBe(cause)
    })

    it('should wrap asynchronous provider failures', async () => {
      const broken: VfsAdapter<MemoryNode> = {
        ...adapter,
        openStream: async () => {
          throw new Error('io error')
        },
      }

      await expect(new VfsResource(lookup('app/main.yml'), broken).openStream()).rejects.toMatchObject(
        { code: 'ADAPTER_FAILURE' }
      )
    })

    it('should pass resource errors through unchanged', async () => {
      const missing: VfsAdapter<MemoryNode> = {
        ...adapter,
        getSize: async () => {
          throw Errors.notFound('VFS resource [x]')
        },
      }

      await expect(
        new VfsResource(lookup('app/main.yml'), missing).contentLength()
      ).rejects.toMatchObject({ code: 'NOT_FOUND', message: 'VFS resource [x] does not exist' })
    })
  })
})
