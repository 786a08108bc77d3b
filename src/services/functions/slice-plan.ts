import type {
  SegmentSlice,
  SlicePlan,
  Trajectory
} from '../../types/trajectory.js'
import type { SegmentAddress } from './frame-locator.js'

const checkAddress = (segments: readonly Trajectory[], address: SegmentAddress, side: string) => {
  const terminal = segments[address.segmentIndex]
  if (!terminal) {
    throw new RangeError(
      `${side}: segment ${address.segmentIndex} requested but only ${segments.length} segments given`
    )
  }
  if (address.localFrame < 0 || address.localFrame >= terminal.length) {
    throw new RangeError(
      `${side}: frame ${address.localFrame} is outside segment ${address.segmentIndex} (${terminal.length} frames)`
    )
  }
  return terminal
}

/**
 * Plan for a single forward chain: all segments before the terminal one in
 * full, then the terminal segment up to and including the first frame in a
 * state. Frame 0 of segment 0 is the starting configuration and is kept.
 */
const buildForwardSlicePlan = (
  segments: readonly Trajectory[],
  address: SegmentAddress
): SlicePlan => {
  const terminal = checkAddress(segments, address, 'forward chain')
  const plan: SlicePlan = segments
    .slice(0, address.segmentIndex)
    .map((segment): SegmentSlice => ({ segment, start: 0, stop: null, stride: 1 }))
  plan.push({ segment: terminal, start: 0, stop: address.localFrame + 1, stride: 1 })
  return plan
}

/**
 * Plan joining a backward ("minus") chain and a forward ("plus") chain that
 * both start from the same configuration.
 *
 * The minus chain is read time-reversed, starting at its first frame in state
 * and ending on its frame 0 (the shared starting configuration). The plus chain
 * is read forward and skips its own frame 0 so the shared configuration appears
 * only once.
 */
const buildTransitionSlicePlan = (
  minusSegments: readonly Trajectory[],
  minusAddress: SegmentAddress,
  plusSegments: readonly Trajectory[],
  plusAddress: SegmentAddress
): SlicePlan => {
  const minusTerminal = checkAddress(minusSegments, minusAddress, 'minus chain')
  const plusTerminal = checkAddress(plusSegments, plusAddress, 'plus chain')

  const plan: SlicePlan = [
    { segment: minusTerminal, start: minusAddress.localFrame, stop: null, stride: -1 }
  ]
  for (let i = minusAddress.segmentIndex - 1; i >= 0; i--) {
    const segment = minusSegments[i]
    plan.push({ segment, start: segment.length - 1, stop: null, stride: -1 })
  }

  if (plusAddress.segmentIndex === 0) {
    plan.push({ segment: plusTerminal, start: 1, stop: plusAddress.localFrame + 1, stride: 1 })
    return plan
  }
  plan.push({ segment: plusSegments[0], start: 1, stop: null, stride: 1 })
  for (let i = 1; i < plusAddress.segmentIndex; i++) {
    plan.push({ segment: plusSegments[i], start: 0, stop: null, stride: 1 })
  }
  plan.push({ segment: plusTerminal, start: 0, stop: plusAddress.localFrame + 1, stride: 1 })
  return plan
}

// Frame indices selected by one slice, in read order.
const sliceFrameIndices = (slice: SegmentSlice): number[] => {
  const n = slice.segment.length
  const frames: number[] = []
  if (slice.stride === 1) {
    const stop = Math.min(slice.stop ?? n, n)
    for (let f = Math.max(slice.start, 0); f < stop; f++) frames.push(f)
  } else {
    const stop = Math.max(slice.stop ?? -1, -1)
    for (let f = Math.min(slice.start, n - 1); f > stop; f--) frames.push(f)
  }
  return frames
}

const slicePlanLength = (plan: SlicePlan): number =>
  plan.reduce((sum, slice) => sum + sliceFrameIndices(slice).length, 0)

export { buildForwardSlicePlan, buildTransitionSlicePlan, sliceFrameIndices, slicePlanLength }
