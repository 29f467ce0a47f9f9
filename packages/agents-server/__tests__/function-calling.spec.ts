// @vitest-environment node
import { describe, expect, it } from 'vitest'
import { buildToolDescriptors, parseFunctionCallArguments } from '../src/tools/function-calling'
import { ToolRegistry } from '../src/tools/registry'
import { createEchoTool, createNowTool } from '../src/tools/builtin/system'

describe('buildToolDescriptors', () => {
  const registry = new ToolRegistry()
  registry.register(createNowTool())
  registry.register(createEchoTool())

  it('describes every registered tool in name order', () => {
    const descriptors = buildToolDescriptors(registry)
    expect(descriptors.map((d) => d.function.name)).toEqual(['echo', 'now'])
    expect(descriptors[0]).toEqual({
      type: 'function',
      function: {
        name: 'echo',
        description: 'Returns the provided text.',
        parameters: registry.require('echo').inputSchema
      }
    })
  })

  it('filters by whitelist', () => {
    expect(buildToolDescriptors(registry, ['now', 'missing']).map((d) => d.function.name)).toEqual(['now'])
  })
})

describe('parseFunctionCallArguments', () => {
  it.each([
    [null, {}],
    [undefined, {}],
    [{ a: 1 }, { a: 1 }],
    ['   ', {}],
    ['{"tz":"UTC"}', { tz: 'UTC' }],
    ['[1,2]', { value: [1, 2] }],
    ['42', { value: 42 }],
    ['{not json', { raw: '{not json' }],
    [7, { value: 7 }],
    [[1], { value: [1] }]
  ])('maps %j', (raw, expected) => {
    expect(parseFunctionCallArguments(raw)).toEqual(expected)
  })
})
