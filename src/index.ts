export type { Trajectory, SegmentSlice, SlicePlan, Stride, FrameAddress } from './types/trajectory.js'
export type { ConditionMatrix, PropagationResult, ConcatenationResult } from './types/trajectory.js'
export type { MDConfig, EngineOptions, MDEngine, MDEngineClass } from './types/engine.js'
export { ProcessLimiter, createProcessLimiter } from './helpers/limiter.js'
export { nstoutFromMdconfig } from './helpers/mdconfig.js'
export {
  PropagationError,
  StepBudgetExceededError,
  OutputAlreadyExistsError,
  InconsistentConditionShapeError,
  NoConditionFulfilledError
} from './services/functions/errors.js'
export {
  blockingCondition,
  suspendingCondition,
  cachedCondition,
  scriptCondition,
  evaluateCondition,
  evaluateConditions
} from './services/functions/condition-functions.js'
export type {
  BlockingCondition,
  SuspendingCondition,
  TrajectoryCondition
} from './services/functions/condition-functions.js'
export {
  segmentAddressForFrame,
  globalFrameForAddress,
  locateFirstTrueFrame,
  locateFirstTrueFrameOfVectors
} from './services/functions/frame-locator.js'
export type { SegmentAddress } from './services/functions/frame-locator.js'
export {
  buildForwardSlicePlan,
  buildTransitionSlicePlan,
  sliceFrameIndices,
  slicePlanLength
} from './services/functions/slice-plan.js'
export {
  ScriptTrajectoryConcatenator,
  StitchingExecutor
} from './services/functions/stitching-functions.js'
export type {
  ConcatenationRequest,
  TrajectoryConcatenator
} from './services/functions/stitching-functions.js'
export { listExistingSegments } from './services/functions/segment-discovery.js'
export type { SegmentLister } from './services/functions/segment-discovery.js'
export { OpenMMScriptEngine } from './services/functions/openmm-functions.js'
export type { OpenMMEngineOptions } from './services/functions/openmm-functions.js'
export { ConditionalTrajectoryPropagator } from './services/pipelines/conditional-propagation.js'
export type { PropagatorOptions } from './services/pipelines/conditional-propagation.js'
export { constructTransitionFromSegmentChains } from './services/pipelines/transition-construction.js'
export type { TransitionFromChains } from './services/pipelines/transition-construction.js'
