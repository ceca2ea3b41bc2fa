/**
 * Dependency resolver for workflow phases.
 *
 * Provides:
 *  - Cycle detection using DFS with visited/inStack sets
 *  - Unknown, duplicate and self-reference detection
 *  - Transitive dependent lookup used when a failed phase prunes the graph
 */

/** Minimal shape the resolver needs; satisfied by Phase */
export interface DependencyNode {
  readonly name: string
  readonly dependsOn: readonly string[]
}

// ---------------------------------------------------------------------------
// detectCycle
// ---------------------------------------------------------------------------

/**
 * Detect a cycle in the phase dependency graph using depth-first search.
 * Nodes are visited in declaration order so the reported cycle is stable.
 *
 * @returns The cycle path (e.g. ['a', 'b', 'a']), or null if there is none
 */
export function detectCycle(nodes: readonly DependencyNode[]): string[] | null {
  const byName = new Map(nodes.map((n) => [n.name, n]))
  const visited = new Set<string>()
  const inStack = new Set<string>()

  function dfs(nodeId: string, path: string[]): string[] | null {
    visited.add(nodeId)
    inStack.add(nodeId)

    for (const dep of byName.get(nodeId)?.dependsOn ?? []) {
      if (inStack.has(dep)) {
        const cycleStart = path.indexOf(dep)
        return [...path.slice(cycleStart), dep]
      }
      if (!visited.has(dep)) {
        const cycle = dfs(dep, [...path, dep])
        if (cycle) return cycle
      }
    }

    inStack.delete(nodeId)
    return null
  }

  for (const node of nodes) {
    if (!visited.has(node.name)) {
      const cycle = dfs(node.name, [node.name])
      if (cycle) return cycle
    }
  }
  return null
}

// ---------------------------------------------------------------------------
// validateDependencies
// ---------------------------------------------------------------------------

/**
 * Check names and references of a phase list.
 *
 * @returns Error messages (empty if all valid)
 */
export function validateDependencies(nodes: readonly DependencyNode[]): string[] {
  const errors: string[] = []
  const seen = new Set<string>()

  for (const node of nodes) {
    if (seen.has(node.name)) {
      errors.push(`Duplicate phase name "${node.name}"`)
    }
    seen.add(node.name)
  }

  for (const node of nodes) {
    for (const dep of node.dependsOn) {
      if (dep === node.name) {
        errors.push(`Phase "${node.name}" depends on itself`)
      } else if (!seen.has(dep)) {
        errors.push(`Phase "${node.name}" references unknown dependency "${dep}"`)
      }
    }
  }

  return errors
}

// ---------------------------------------------------------------------------
// transitiveDependents
// ---------------------------------------------------------------------------

/**
 * Every phase that directly or indirectly depends on `name`, in declaration order.
 */
export function transitiveDependents(nodes: readonly DependencyNode[], name: string): string[] {
  const affected = new Set<string>([name])
  let changed = true
  while (changed) {
    changed = false
    for (const node of nodes) {
      if (affected.has(node.name)) continue
      if (node.dependsOn.some((dep) => affected.has(dep))) {
        affected.add(node.name)
        changed = true
      }
    }
  }
  return nodes.map((n) => n.name).filter((n) => n !== name && affected.has(n))
}
