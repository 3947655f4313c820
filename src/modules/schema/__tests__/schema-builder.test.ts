/**
 * Unit tests for schema-builder.ts and schema.ts
 *
 * Tests:
 *  - setting/config declaration order and defaults
 *  - template resolution (implicit by name, explicit, template + block)
 *  - declaration errors
 *  - Schema navigation helpers (expandKey, isKeyDefined, defaultFor, settingPaths)
 */

import { describe, it, expect } from 'vitest'
import { SchemaBuilder, defineSchema } from '../schema-builder.js'
import { Schema } from '../schema.js'
import { DeclarationError } from '../../../core/errors.js'

// ---------------------------------------------------------------------------
// Fixture
// ---------------------------------------------------------------------------

function buildTestSchema(): Schema {
  return defineSchema((root) => {
    root.setting('one')
    root.config('two', (two) => {
      two.setting('three')
      two.config('four', (four) => {
        four.setting('five', 'five')
      })
    })
    root.template('six', (t) => {
      t.setting('eight')
    })
    root.config('six')
    root.config('seven', 'six', (seven) => {
      seven.setting('nine')
    })
  })
}

function childOf(schema: Schema, name: string): Schema {
  const child = schema.child(name)
  if (child === undefined) throw new Error(`missing child schema ${name}`)
  return child
}

// ---------------------------------------------------------------------------
// Declarations
// ---------------------------------------------------------------------------

describe('defineSchema - declarations', () => {
  it('lists only directly declared settings on the root', () => {
    const schema = buildTestSchema()
    expect(schema.settings).toEqual(['one'])
    expect([...schema.children.keys()]).toEqual(['two', 'six', 'seven'])
  })

  it('builds nested child schemas with their own settings', () => {
    const schema = buildTestSchema()
    const two = childOf(schema, 'two')
    const four = childOf(two, 'four')

    expect(two.settings).toEqual(['three'])
    expect(four.settings).toEqual(['five'])
    expect(four.defaults.get('five')).toBe('five')
  })

  it('keeps settings in declaration order', () => {
    const schema = defineSchema((root) => {
      root.setting('zeta').setting('alpha').setting('mid')
    })
    expect(schema.settings).toEqual(['zeta', 'alpha', 'mid'])
  })

  it('records no default for null or undefined', () => {
    const schema = defineSchema((root) => {
      root.setting('a', null)
      root.setting('b')
      root.setting('c', false)
      root.setting('d', 0)
    })
    expect([...schema.defaults.keys()]).toEqual(['c', 'd'])
  })

  it('computes pathFromRoot for every level', () => {
    const schema = buildTestSchema()
    const four = childOf(childOf(schema, 'two'), 'four')

    expect(schema.pathFromRoot).toBe('')
    expect(childOf(schema, 'two').pathFromRoot).toBe('two')
    expect(four.pathFromRoot).toBe('two.four')
    expect(four.name).toBe('four')
    expect(four.root).toBe(schema)
    expect(four.parent?.parent).toBe(schema)
  })

  it('freezes the built schema', () => {
    const schema = buildTestSchema()
    expect(Object.isFrozen(schema)).toBe(true)
    expect(Object.isFrozen(schema.settings)).toBe(true)
  })

  it('is not affected by declarations made after build', () => {
    const builder = new SchemaBuilder()
    builder.setting('one')
    const schema = builder.build()
    builder.setting('two')

    expect(schema.settings).toEqual(['one'])
  })
})

// ---------------------------------------------------------------------------
// Templates
// ---------------------------------------------------------------------------

describe('defineSchema - templates', () => {
  it('applies the template named like the child when no block is given', () => {
    const six = childOf(buildTestSchema(), 'six')
    expect(six.settings).toEqual(['eight'])
  })

  it('applies an explicit template before the block', () => {
    const seven = childOf(buildTestSchema(), 'seven')
    expect(seven.settings).toEqual(['eight', 'nine'])
  })

  it('exposes the templates on the root schema only', () => {
    const schema = buildTestSchema()
    expect([...(schema.templates?.keys() ?? [])]).toEqual(['six'])
    expect(childOf(schema, 'six').templates).toBeUndefined()
  })

  it('makes root templates available to nested configs', () => {
    const schema = defineSchema((root) => {
      root.template('endpoint', (t) => {
        t.setting('url')
      })
      root.config('services', (services) => {
        services.config('billing', 'endpoint')
        services.config('endpoint')
      })
    })
    const services = childOf(schema, 'services')
    expect(childOf(services, 'billing').settings).toEqual(['url'])
    expect(childOf(services, 'endpoint').settings).toEqual(['url'])
  })

  it('fails when no block is given and no template matches the name', () => {
    expect(() =>
      defineSchema((root) => {
        root.config('missing')
      })
    ).toThrow("no template or block specified, and no template 'missing' found")
  })

  it('fails when an explicit template does not exist', () => {
    expect(() =>
      defineSchema((root) => {
        root.config('api', 'credentials', (api) => {
          api.setting('url')
        })
      })
    ).toThrow("template 'credentials' not found")
  })

  it('requires templates to be declared before use', () => {
    expect(() =>
      defineSchema((root) => {
        root.config('six')
        root.template('six', (t) => {
          t.setting('eight')
        })
      })
    ).toThrow(DeclarationError)
  })

  it('rejects a template without a block', () => {
    expect(() =>
      defineSchema((root) => {
        root.template('empty')
      })
    ).toThrow('block required')
  })

  it('rejects templates declared below the root', () => {
    expect(() =>
      defineSchema((root) => {
        root.config('nested', (nested) => {
          nested.template('inner', (t) => {
            t.setting('x')
          })
        })
      })
    ).toThrow("template 'inner' must be declared on the root schema")
  })
})

// ---------------------------------------------------------------------------
// Declaration errors
// ---------------------------------------------------------------------------

describe('defineSchema - declaration errors', () => {
  it('rejects invalid setting names', () => {
    expect(() =>
      defineSchema((root) => {
        root.setting('not-valid')
      })
    ).toThrow('invalid key: not-valid')
  })

  it('rejects invalid child names', () => {
    expect(() =>
      defineSchema((root) => {
        root.config('a.b', (c) => {
          c.setting('x')
        })
      })
    ).toThrow(DeclarationError)
  })

  it('rejects a setting declared twice', () => {
    expect(() =>
      defineSchema((root) => {
        root.setting('one')
        root.setting('one', 'again')
      })
    ).toThrow("'one' is already declared")
  })

  it('rejects a child that reuses a setting name', () => {
    expect(() =>
      defineSchema((root) => {
        root.config('two', (two) => {
          two.setting('three')
          two.config('three', (three) => {
            three.setting('x')
          })
        })
      })
    ).toThrow("'two.three' is already declared")
  })

  it('rejects a block that redeclares a template setting', () => {
    expect(() =>
      defineSchema((root) => {
        root.template('six', (t) => {
          t.setting('eight')
        })
        root.config('seven', 'six', (seven) => {
          seven.setting('eight', 8)
        })
      })
    ).toThrow("'seven.eight' is already declared")
  })

  it('carries the offending key in the error context', () => {
    try {
      defineSchema((root) => {
        root.setting('bad key')
      })
      expect.fail('expected a DeclarationError')
    } catch (err) {
      expect(err).toBeInstanceOf(DeclarationError)
      if (err instanceof DeclarationError) {
        expect(err.code).toBe('DECLARATION_ERROR')
        expect(err.context.key).toBe('bad key')
      }
    }
  })

  it('only builds from the root builder', () => {
    const root = new SchemaBuilder()
    const child = root.config('two', (two) => {
      two.setting('three')
    })
    expect(() => child.build()).toThrow('only the root schema can be built')
  })
})

// ---------------------------------------------------------------------------
// Schema navigation
// ---------------------------------------------------------------------------

describe('Schema', () => {
  const schema = buildTestSchema()
  const two = childOf(schema, 'two')

  it('expands keys relative to the root', () => {
    expect(schema.expandKey('one')).toBe('one')
    expect(two.expandKey('three')).toBe('two.three')
    expect(childOf(two, 'four').expandKey('five')).toBe('two.four.five')
  })

  it('reports defined settings along dotted paths', () => {
    expect(schema.isKeyDefined('one')).toBe(true)
    expect(schema.isKeyDefined('two.three')).toBe(true)
    expect(schema.isKeyDefined('two.four.five')).toBe(true)
    expect(schema.isKeyDefined(['two', 'four', 'five'])).toBe(true)
  })

  it('does not treat child configs or unknown keys as defined settings', () => {
    expect(schema.isKeyDefined('two')).toBe(false)
    expect(schema.isKeyDefined('two.four')).toBe(false)
    expect(schema.isKeyDefined('two.five')).toBe(false)
    expect(schema.isKeyDefined('one.extra')).toBe(false)
    expect(schema.isKeyDefined('')).toBe(false)
    expect(schema.isKeyDefined([])).toBe(false)
  })

  it('resolves defaults through nested schemas', () => {
    expect(schema.defaultFor('two.four.five')).toBe('five')
    expect(two.defaultFor('four.five')).toBe('five')
    expect(schema.defaultFor('one')).toBeUndefined()
    expect(schema.defaultFor('nope.five')).toBeUndefined()
  })

  it('lists setting paths depth-first, settings before children', () => {
    expect(schema.settingPaths()).toEqual([
      'one',
      'two.three',
      'two.four.five',
      'six.eight',
      'seven.eight',
      'seven.nine',
    ])
  })

  it('describes itself by path', () => {
    expect(schema.toString()).toBe('Schema(<root>)')
    expect(two.toString()).toBe('Schema(two)')
    expect(schema.isRoot).toBe(true)
    expect(two.isRoot).toBe(false)
  })
})
