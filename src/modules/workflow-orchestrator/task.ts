/**
 * Task construction. A task is frozen once accepted.
 */

import type { Task, TaskSource } from '../../core/types.js'
import { generateId } from '../../utils/helpers.js'

export interface TaskInput {
  description: string
  workflowId?: string
  source?: TaskSource
}

export function createTask(input: TaskInput): Task {
  const source = input.source !== undefined ? Object.freeze({ ...input.source }) : undefined
  return Object.freeze({
    workflowId: input.workflowId ?? generateId('wf'),
    description: input.description,
    ...(source !== undefined ? { source } : {}),
  })
}

export function workflowStateKey(workflowId: string): string {
  return `workflow:${workflowId}`
}
