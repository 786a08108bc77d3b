import { logger } from '../../helpers/loggers.js'
import { runPythonStep, describeExit } from '../../helpers/runPythonStep.js'
import { trajectoryKey } from '../../types/trajectory.js'
import type { Trajectory } from '../../types/trajectory.js'
import { InconsistentConditionShapeError } from './errors.js'

// A condition that runs inline and holds the event loop while it computes.
export interface BlockingCondition {
  kind: 'blocking'
  name: string
  evaluate: (traj: Trajectory) => boolean[]
}

export interface SuspendingCondition {
  kind: 'suspending'
  name: string
  evaluate: (traj: Trajectory) => Promise<boolean[]>
}

export type TrajectoryCondition = BlockingCondition | SuspendingCondition

const blockingCondition = (
  name: string,
  evaluate: (traj: Trajectory) => boolean[]
): BlockingCondition => ({ kind: 'blocking', name, evaluate })

const suspendingCondition = (
  name: string,
  evaluate: (traj: Trajectory) => Promise<boolean[]>
): SuspendingCondition => ({ kind: 'suspending', name, evaluate })

const checkShape = (values: boolean[], traj: Trajectory, conditionIndex: number): boolean[] => {
  if (values.length !== traj.length) {
    throw new InconsistentConditionShapeError(conditionIndex, traj.length, values.length)
  }
  return values
}

const evaluateCondition = async (
  condition: TrajectoryCondition,
  traj: Trajectory,
  conditionIndex = 0
): Promise<boolean[]> => {
  const values =
    condition.kind === 'suspending' ? await condition.evaluate(traj) : condition.evaluate(traj)
  return checkShape(values, traj, conditionIndex)
}

/**
 * Evaluate every condition on `traj`, one boolean per frame each.
 *
 * All suspending conditions are started first and run concurrently, blocking
 * ones then run inline in list order. The result is always in the order of
 * `conditions`, whatever order the suspending ones finish in.
 */
const evaluateConditions = async (
  conditions: readonly TrajectoryCondition[],
  traj: Trajectory
): Promise<boolean[][]> => {
  const pending = new Map<number, Promise<boolean[]>>()
  conditions.forEach((condition, idx) => {
    if (condition.kind === 'suspending') pending.set(idx, condition.evaluate(traj))
  })
  const suspended = Promise.all(pending.values())
  // keep a rejection from surfacing as unhandled while blocking conditions run
  suspended.catch(() => undefined)

  const results: boolean[][] = []
  conditions.forEach((condition, idx) => {
    if (condition.kind === 'blocking') {
      results[idx] = checkShape(condition.evaluate(traj), traj, idx)
    }
  })

  const suspendedValues = await suspended
  let i = 0
  for (const idx of pending.keys()) {
    results[idx] = checkShape(suspendedValues[i++], traj, idx)
  }
  return results
}

const warnAboutBlockingConditions = (conditions: readonly TrajectoryCondition[]): void => {
  const blocking = conditions.filter((c) => c.kind === 'blocking').map((c) => c.name)
  if (blocking.length > 0) {
    logger.warn(
      `Blocking conditions will hold the event loop while evaluated: ${blocking.join(', ')}. ` +
        'Wrap them as suspending conditions to evaluate them concurrently.'
    )
  }
}

/**
 * Memoize a condition per trajectory. Concurrent calls on the same trajectory
 * share one evaluation; failed evaluations are not cached.
 *
 * Entries are never evicted, so the memo lives as long as the returned
 * condition. Build one per job (see processCommittorShot).
 */
const cachedCondition = (condition: TrajectoryCondition): SuspendingCondition => {
  const cache = new Map<string, Promise<boolean[]>>()
  return suspendingCondition(condition.name, (traj) => {
    const key = trajectoryKey(traj)
    const hit = cache.get(key)
    if (hit) return hit
    const computed =
      condition.kind === 'suspending'
        ? condition.evaluate(traj)
        : Promise.resolve().then(() => condition.evaluate(traj))
    cache.set(key, computed)
    computed.catch(() => cache.delete(key))
    return computed
  })
}

const parseFrameValue = (line: string): boolean | undefined => {
  switch (line.trim().toLowerCase()) {
    case '1':
    case 'true':
      return true
    case '0':
    case 'false':
      return false
    default:
      return undefined
  }
}

/**
 * Condition computed by an external Python script, invoked as
 * `script --structure <file> <traj files...>`. The script prints one value per
 * frame (`1`/`0` or `True`/`False`); other stdout lines are logged and ignored.
 */
const scriptCondition = (
  name: string,
  scriptPath: string,
  opts: { pythonBin?: string; timeoutMs?: number } = {}
): SuspendingCondition =>
  suspendingCondition(name, async (traj) => {
    const values: boolean[] = []
    const result = await runPythonStep(
      scriptPath,
      ['--structure', traj.structureFile, ...traj.trajectoryFiles],
      {
        pythonBin: opts.pythonBin,
        timeoutMs: opts.timeoutMs,
        onStdoutLine: (line) => {
          const value = parseFrameValue(line)
          if (value === undefined) {
            logger.debug(`[condition ${name}][stdout] ${line}`)
          } else {
            values.push(value)
          }
        },
        onStderrLine: (line) => logger.warn(`[condition ${name}][stderr] ${line}`)
      }
    )
    if (result.code !== 0) {
      throw new Error(`Condition script ${name} failed (${describeExit(result)})`)
    }
    return values
  })

export {
  blockingCondition,
  suspendingCondition,
  evaluateCondition,
  evaluateConditions,
  warnAboutBlockingConditions,
  cachedCondition,
  scriptCondition
}
