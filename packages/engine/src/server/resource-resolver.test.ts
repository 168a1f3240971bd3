import { beforeEach, describe, expect, it } from 'vitest'
import { InMemoryFileSystem } from '../testing/in-memory-filesystem.js'
import { ResourceResolver } from './resource-resolver.js'

const ROOT = '/srv/site'

describe('ResourceResolver', () => {
  let fs: InMemoryFileSystem
  let resolver: ResourceResolver

  beforeEach(async () => {
    fs = new InMemoryFileSystem()
    await fs.writeFile(`${ROOT}/TestBase.html`, '<html>{{cs371date}}</html>')
    await fs.writeFile(`${ROOT}/notFound.html`, '<h1>404</h1>')
    await fs.writeFile(`${ROOT}/docs/a.txt`, 'hello')
    await fs.writeFile(`${ROOT}/my file.txt`, 'spaced')
    await fs.writeFile('/etc/secret', 'top-secret')
    resolver = new ResourceResolver({ root: `${ROOT}/`, fs, templateFile: 'TestBase.html' })
  })

  it('maps the bare path to the landing page', async () => {
    expect(await resolver.resolve('GET / HTTP/1.1')).toEqual({
      kind: 'home',
      templatePath: `${ROOT}/TestBase.html`,
    })
  })

  it('reports a missing template as no-template', async () => {
    const bare = new ResourceResolver({ root: ROOT, fs, templateFile: 'Other.html' })
    expect(await bare.resolve('GET / HTTP/1.1')).toEqual({ kind: 'missing', reason: 'no-template' })
  })

  it('resolves a regular file with its size', async () => {
    expect(await resolver.resolve('GET /docs/a.txt HTTP/1.1')).toEqual({
      kind: 'file',
      path: `${ROOT}/docs/a.txt`,
      size: 5,
    })
  })

  it('serves the template itself when requested by name', async () => {
    expect(await resolver.resolve('GET /TestBase.html HTTP/1.1')).toMatchObject({ kind: 'file' })
  })

  it('ignores method and version', async () => {
    expect(await resolver.resolve('POST /docs/a.txt HTTP/1.0')).toMatchObject({
      kind: 'file',
      path: `${ROOT}/docs/a.txt`,
    })
  })

  it('drops the query string and fragment', async () => {
    expect(await resolver.resolve('GET /docs/a.txt?v=2#top HTTP/1.1')).toMatchObject({
      kind: 'file',
      path: `${ROOT}/docs/a.txt`,
    })
  })

  it('decodes percent-escapes', async () => {
    expect(await resolver.resolve('GET /my%20file.txt HTTP/1.1')).toMatchObject({
      kind: 'file',
      path: `${ROOT}/my file.txt`,
    })
  })

  it('folds dot segments that stay inside the root', async () => {
    expect(await resolver.resolve('GET /docs/../docs/./a.txt HTTP/1.1')).toMatchObject({
      kind: 'file',
      path: `${ROOT}/docs/a.txt`,
    })
  })

  it('treats a backslash as part of the file name', async () => {
    await fs.writeFile(`${ROOT}/a\\b.txt`, 'bs')
    expect(await resolver.resolve('GET /a\\b.txt HTTP/1.1')).toEqual({
      kind: 'file',
      path: `${ROOT}/a\\b.txt`,
      size: 2,
    })
  })

  it.each([
    ['no-request', null],
    ['malformed-request', 'GARBAGE'],
    ['malformed-request', 'GET /no-version'],
    ['malformed-request', 'GET /%E0%A4%A HTTP/1.1'],
    ['malformed-request', 'GET /a%00b HTTP/1.1'],
    ['not-found', 'GET /nope.txt HTTP/1.1'],
    ['not-found', 'GET /..\\..\\etc/secret HTTP/1.1'],
    ['not-a-file', 'GET /docs HTTP/1.1'],
    ['not-a-file', 'GET /docs/ HTTP/1.1'],
    ['outside-root', 'GET /../../etc/secret HTTP/1.1'],
    ['outside-root', 'GET /docs/%2e%2e/%2e%2e/x HTTP/1.1'],
  ])('classifies as %s: %s', async (reason, line) => {
    expect(await resolver.resolve(line)).toEqual({ kind: 'missing', reason })
  })

  it('refuses a symlink that leaves the root', async () => {
    await fs.symlink('/etc/secret', `${ROOT}/leak.txt`)
    expect(await resolver.resolve('GET /leak.txt HTTP/1.1')).toEqual({
      kind: 'missing',
      reason: 'outside-root',
    })
  })

  it('follows a symlink that stays inside the root', async () => {
    await fs.symlink(`${ROOT}/docs/a.txt`, `${ROOT}/alias.txt`)
    expect(await resolver.resolve('GET /alias.txt HTTP/1.1')).toEqual({
      kind: 'file',
      path: `${ROOT}/alias.txt`,
      size: 5,
    })
  })

  it('accepts a document root that is itself a symlink', async () => {
    await fs.symlink(ROOT, '/www')
    const linked = new ResourceResolver({ root: '/www', fs, templateFile: 'TestBase.html' })
    expect(await linked.resolve('GET /docs/a.txt HTTP/1.1')).toMatchObject({ kind: 'file' })
  })

  it('sees files created after construction', async () => {
    expect(await resolver.resolve('GET /late.txt HTTP/1.1')).toMatchObject({ kind: 'missing' })
    await fs.writeFile(`${ROOT}/late.txt`, 'x')
    expect(await resolver.resolve('GET /late.txt HTTP/1.1')).toMatchObject({ kind: 'file', size: 1 })
  })

  it('builds root-relative paths', () => {
    expect(resolver.pathFor('notFound.html')).toBe(`${ROOT}/notFound.html`)
    expect(resolver.pathFor('/Test.html')).toBe(`${ROOT}/Test.html`)
  })
})
