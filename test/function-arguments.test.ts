import {describe, expect, it} from 'vitest'
import {z} from 'zod'
import {FunctionArguments} from '../src/chat/function-arguments.js'

describe('FunctionArguments', () => {
  it('reads typed parameters', () => {
    const args = new FunctionArguments('{"path":"notes.md","limit":3}')

    expect(args.get('path', z.string(), '')).toEqual({value: 'notes.md'})
    expect(args.get('limit', z.number().int(), 0)).toEqual({value: 3})
    expect(args.has('path')).toBe(true)
    expect(args.toJSON()).toEqual({path: 'notes.md', limit: 3})
  })

  it('falls back when a parameter fails its schema', () => {
    const args = new FunctionArguments('{"limit":"three"}')
    const limit = args.get('limit', z.number(), 10)

    expect(limit.value).toBe(10)
    expect(limit.error?.message).toBe("Invalid argument 'limit': Expected number, received string")
  })

  it('reports missing parameters', () => {
    const args = new FunctionArguments('{}')
    const query = args.get('query', z.string(), 'none')

    expect(query).toEqual({value: 'none', error: new Error("Missing argument 'query'.")})
    expect(args.has('query')).toBe(false)
  })

  it('treats an empty payload as no arguments', () => {
    const args = new FunctionArguments('  ')

    expect(args.parseError).toBeUndefined()
    expect(args.toJSON()).toEqual({})
  })

  it('captures malformed payloads without throwing', () => {
    const broken = new FunctionArguments('{"path": ')
    expect(broken.parseError?.message).toMatch(/^Tool arguments are not valid JSON: /)
    expect(broken.get('path', z.string(), 'fallback')).toEqual({value: 'fallback', error: broken.parseError})

    const list = new FunctionArguments('[1, 2]')
    expect(list.parseError?.message).toBe('Tool arguments must be a JSON object.')
  })

  it('applies schema transforms', () => {
    const args = new FunctionArguments('{"tags":" a , b "}')
    const tags = args.get(
      'tags',
      z.string().transform((value) => value.split(',').map((tag) => tag.trim())),
      []
    )

    expect(tags.value).toEqual(['a', 'b'])
  })
})
