import {describe, expect, it} from 'vitest'
import {ToolCallAccumulator} from '../src/chat/tool-call-accumulator.js'

describe('ToolCallAccumulator', () => {
  it('reassembles interleaved fragments by index', () => {
    const accumulator = new ToolCallAccumulator()
    accumulator.feed(0, {id: 'call_a', functionName: 'read_', arguments: '{"pa'})
    accumulator.feed(1, {id: 'call_b', functionName: 'list_files', arguments: ''})
    accumulator.feed(0, {functionName: 'file', arguments: 'th":'})
    accumulator.feed(1, {arguments: '{}'})
    accumulator.feed(0, {arguments: '"a.txt"}'})

    expect(accumulator.seal()).toEqual([
      {id: 'call_a', functionName: 'read_file', arguments: '{"path":"a.txt"}'},
      {id: 'call_b', functionName: 'list_files', arguments: '{}'}
    ])
  })

  it('orders calls by index rather than arrival', () => {
    const accumulator = new ToolCallAccumulator()
    accumulator.feed(2, {functionName: 'second', arguments: '{}'})
    accumulator.feed(0, {functionName: 'first', arguments: '{}'})

    expect(accumulator.seal().map((call) => call.functionName)).toEqual(['first', 'second'])
  })

  it('keeps the first id seen and leaves missing ids out', () => {
    const accumulator = new ToolCallAccumulator()
    accumulator.feed(0, {id: 'call_1', functionName: 'lookup'})
    accumulator.feed(0, {id: 'call_other'})
    accumulator.feed(1, {functionName: 'noid'})

    const [first, second] = accumulator.seal()
    expect(first).toEqual({id: 'call_1', functionName: 'lookup', arguments: ''})
    expect(second).toEqual({functionName: 'noid', arguments: ''})
    expect(second).not.toHaveProperty('id')
  })

  it('starts over empty after sealing', () => {
    const accumulator = new ToolCallAccumulator()
    accumulator.feed(0, {functionName: 'lookup', arguments: '{}'})
    expect(accumulator.size).toBe(1)

    accumulator.seal()
    expect(accumulator.size).toBe(0)
    expect(accumulator.seal()).toEqual([])
  })
})
