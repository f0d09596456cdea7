/**
 * UrlResource Tests
 *
 * HTTP is never contacted: `fetch` is stubbed for http(s) URLs, and `data:`
 * URLs exercise the real fetch path in process.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import path from 'node:path'
import os from 'node:os'
import { ReadableStream } from 'node:stream/web'
import { pathToFileURL } from 'node:url'
import { UrlResource } from './url.js'
import { readText } from './streams.js'

function caught(fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }
  return undefined
}

describe('UrlResource', () => {
  describe('descriptor', () => {
    it('should describe itself by URL', () => {
      const resource = new UrlResource('https://example.com/a/b.txt')

      expect(resource.getDescription()).toBe('URL [https://example.com/a/b.txt]')
      expect(resource.getURL().href).toBe('https://example.com/a/b.txt')
      expect(resource.getURI()).toBe('https://example.com/a/b.txt')
      expect(resource.isFile()).toBe(false)
    })

    it('should reject malformed URLs', () => {
      expect(caught(() => new UrlResource('not a url'))).toMatchObject({
        code: 'MALFORMED_LOCATION',
      })
    })

    it('should decode the filename', () => {
      expect(new UrlResource('https://example.com/dir/my%20file.txt').getFilename()).toBe(
        'my file.txt'
      )
    })

    it('should resolve relative URLs against its directory', () => {
      const resource = new UrlResource('https://example.com/a/b.txt')

      expect(resource.createRelative('c.txt').getURL().href).toBe('https://example.com/a/c.txt')
      expect(resource.createRelative('/c.txt').getURL().href).toBe('https://example.com/a/c.txt')
      expect(resource.createRelative('../d/e.txt').getURL().href).toBe(
        'https://example.com/d/e.txt'
      )
    })

    it('should not resolve non-file URLs to files', () => {
      expect(caught(() => new UrlResource('https://example.com/a').getFile())).toMatchObject({
        code: 'UNRESOLVABLE',
        message: 'URL [https://example.com/a] cannot be resolved to absolute file path',
      })
    })

    it('should compare by URL', () => {
      const first = new UrlResource('https://example.com/a')
      const second = new UrlResource(new URL('https://example.com/a'))

      expect(first.equals(second)).toBe(true)
      expect(first.hashCode()).toBe(second.hashCode())
    })
  })

  describe('file URLs', () => {
    let tempDir: string

    beforeEach(async () => {
      tempDir = await mkdtemp(path.join(os.tmpdir(), 'resource-url-'))
      await writeFile(path.join(tempDir, 'data.txt'), 'file content')
    })

    afterEach(async () => {
      await rm(tempDir, { recursive: true, force: true })
    })

    it('should behave like a file', async () => {
      const file = path.join(tempDir, 'data.txt')
      const resource = new UrlResource(pathToFileURL(file))

      expect(resource.isFile()).toBe(true)
      expect(resource.getFile()).toBe(file)
      expect(resource.getFilename()).toBe('data.txt')
      await expect(resource.exists()).resolves.toBe(true)
      await expect(resource.isReadable()).resolves.toBe(true)
      await expect(resource.contentLength()).resolves.toBe(12)
      await expect(readText(resource)).resolves.toBe('file content')
      expect(await resource.lastModified()).toBeGreaterThan(0)
    })

    it('should report missing files', async () => {
      const resource = new UrlResource(pathToFileURL(path.join(tempDir, 'missing.txt')))

      await expect(resource.exists()).resolves.toBe(false)
      await expect(resource.openStream()).rejects.toMatchObject({ code: 'NOT_FOUND' })
      await expect(resource.lastModified()).rejects.toMatchObject({ code: 'NOT_FOUND' })
    })

    it('should create relative file URLs', () => {
      const resource = new UrlResource(pathToFileURL(path.join(tempDir, 'data.txt')))

      expect(resource.createRelative('other.txt').getURL().href).toBe(
        pathToFileURL(path.join(tempDir, 'other.txt')).href
      )
    })
  })

  describe('data URLs', () => {
    const resource = new UrlResource('data:text/plain,hello')

    it('should read through fetch', async () => {
      await expect(readText(resource)).resolves.toBe('hello')
    })

    it('should fall back to the stream for existence and length', async () => {
      await expect(resource.exists()).resolves.toBe(true)
      await expect(resource.contentLength()).resolves.toBe(5)
    })

    it('should have no file for the last-modified check', async () => {
      await expect(resource.lastModified()).rejects.toMatchObject({ code: 'UNRESOLVABLE' })
    })
  })

  describe('http URLs', () => {
    afterEach(() => {
      vi.unstubAllGlobals()
    })

    it('should check existence with a HEAD request', async () => {
      const fetchMock = vi.fn(async () => new Response(null, { status: 404 }))
      vi.stubGlobal('fetch', fetchMock)

      await expect(new UrlResource('https://example.com/missing').exists()).resolves.toBe(false)
      expect(fetchMock).toHaveBeenCalledWith(new URL('https://example.com/missing'), {
        method: 'HEAD',
      })
    })

    it('should report unreachable hosts as absent', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn(async () => {
          throw new TypeError('fetch failed')
        })
      )
      const resource = new UrlResource('https://unreachable.invalid/x')

      await expect(resource.exists()).resolves.toBe(false)
      await expect(resource.isReadable()).resolves.toBe(false)
    })

    it('should read length and timestamp from response headers', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn(
          async () =>
            new Response(null, {
              status: 200,
              headers: {
                'content-length': '42',
                'last-modified': 'Wed, 21 Oct 2015 07:28:00 GMT',
              },
            })
        )
      )
      const resource = new UrlResource('https://example.com/file.bin')

      await expect(resource.contentLength()).resolves.toBe(42)
      await expect(resource.lastModified()).resolves.toBe(1445412480000)
    })

    it('should signal NOT_FOUND when the server refuses the content', async () => {
      vi.stubGlobal('fetch', vi.fn(async () => new Response('nope', { status: 500 })))

      await expect(new UrlResource('https://example.com/broken').openStream()).rejects.toMatchObject(
        {
          code: 'NOT_FOUND',
          message: 'URL [https://example.com/broken] cannot be opened: server responded with 500',
        }
      )
    })

    it('should stream the response body', async () => {
      vi.stubGlobal('fetch', vi.fn(async () => new Response('remote body', { status: 200 })))

      await expect(readText(new UrlResource('https://example.com/ok'))).resolves.toBe('remote body')
    })

    it('should hand out the stream before the body completes', async () => {
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode('first chunk'))
        },
      })
      vi.stubGlobal('fetch', vi.fn(async () => new Response(body, { status: 200 })))

      const stream = await new UrlResource('https://example.com/live').openStream()
      try {
        const first = await stream[Symbol.asyncIterator]().next()
        expect(Buffer.from(first.value).toString('utf8')).toBe('first chunk')
      } finally {
        stream.destroy()
      }
    })
  })
})
