/**
 * Unit tests for dependency-resolver.ts
 */

import { describe, it, expect } from 'vitest'
import {
  detectCycle,
  validateDependencies,
  transitiveDependents,
  type DependencyNode,
} from '../dependency-resolver.js'

function node(name: string, dependsOn: string[] = []): DependencyNode {
  return { name, dependsOn }
}

// ---------------------------------------------------------------------------
// detectCycle tests
// ---------------------------------------------------------------------------

describe('detectCycle', () => {
  it('returns null for phases with no dependencies', () => {
    expect(detectCycle([node('a'), node('b')])).toBeNull()
  })

  it('returns null for a linear chain', () => {
    expect(detectCycle([node('scout'), node('plan', ['scout']), node('build', ['plan'])])).toBeNull()
  })

  it('returns null for a diamond', () => {
    const nodes = [node('a'), node('b', ['a']), node('c', ['a']), node('d', ['b', 'c'])]
    expect(detectCycle(nodes)).toBeNull()
  })

  it('returns the path of a direct cycle', () => {
    expect(detectCycle([node('a', ['b']), node('b', ['a'])])).toEqual(['a', 'b', 'a'])
  })

  it('returns the path of an indirect cycle', () => {
    const nodes = [node('a', ['b']), node('b', ['c']), node('c', ['a'])]
    expect(detectCycle(nodes)).toEqual(['a', 'b', 'c', 'a'])
  })

  it('reports only the cyclic part of the path', () => {
    const nodes = [node('entry', ['x']), node('x', ['y']), node('y', ['x'])]
    expect(detectCycle(nodes)).toEqual(['x', 'y', 'x'])
  })

  it('detects a self-loop', () => {
    expect(detectCycle([node('a', ['a'])])).toEqual(['a', 'a'])
  })
})

// ---------------------------------------------------------------------------
// validateDependencies tests
// ---------------------------------------------------------------------------

describe('validateDependencies', () => {
  it('returns no errors for valid references', () => {
    expect(validateDependencies([node('a'), node('b', ['a'])])).toEqual([])
  })

  it('reports unknown dependencies', () => {
    expect(validateDependencies([node('a', ['ghost'])])).toEqual([
      'Phase "a" references unknown dependency "ghost"',
    ])
  })

  it('reports self dependencies', () => {
    expect(validateDependencies([node('a', ['a'])])).toEqual(['Phase "a" depends on itself'])
  })

  it('reports duplicate names', () => {
    expect(validateDependencies([node('a'), node('a')])).toEqual(['Duplicate phase name "a"'])
  })

  it('accepts forward references', () => {
    expect(validateDependencies([node('b', ['a']), node('a')])).toEqual([])
  })
})

// ---------------------------------------------------------------------------
// transitiveDependents tests
// ---------------------------------------------------------------------------

describe('transitiveDependents', () => {
  const nodes = [
    node('scout'),
    node('plan', ['scout']),
    node('build', ['plan']),
    node('test', ['build']),
    node('review', ['build']),
    node('docs'),
  ]

  it('returns direct and indirect dependents in declaration order', () => {
    expect(transitiveDependents(nodes, 'plan')).toEqual(['build', 'test', 'review'])
  })

  it('returns an empty list for a leaf', () => {
    expect(transitiveDependents(nodes, 'review')).toEqual([])
  })

  it('ignores unrelated phases', () => {
    expect(transitiveDependents(nodes, 'scout')).not.toContain('docs')
  })
})
