import type { Task } from '../domain/task'
import { compareUrgency } from '../domain/task'
import type { TaskPolicyRule } from './types'

// Every condition present in `when` must hold; an empty `when` matches all tasks
export function policyMatches(rule: TaskPolicyRule, task: Task, workerId: string): boolean {
  const { workerIds, buildingIds, categories, titleIncludes } = rule.when
  if (workerIds && !workerIds.includes(workerId)) return false
  if (buildingIds && !(task.buildingId && buildingIds.includes(task.buildingId))) return false
  if (categories && !categories.includes(task.category)) return false
  if (titleIncludes) {
    const title = task.title.toLowerCase()
    if (!titleIncludes.some((term) => title.includes(term.toLowerCase()))) return false
  }
  return true
}

/**
 * Applies declarative task policies in order. A later rule's `requiresPhoto`
 * overrides an earlier one; `minimumUrgency` only ever raises urgency.
 */
export function applyTaskPolicies(tasks: Task[], workerId: string, rules: TaskPolicyRule[]): Task[] {
  if (rules.length === 0) return tasks
  return tasks.map((task) =>
    rules.reduce<Task>((acc, rule) => {
      if (!policyMatches(rule, acc, workerId)) return acc
      const next = { ...acc }
      if (rule.then.requiresPhoto !== undefined) next.requiresPhoto = rule.then.requiresPhoto
      const minimum = rule.then.minimumUrgency
      if (minimum && compareUrgency(next.urgency, minimum) < 0) next.urgency = minimum
      return next
    }, task),
  )
}
