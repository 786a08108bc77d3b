import type { ConditionMatrix, FrameAddress } from '../../types/trajectory.js'

export interface SegmentAddress {
  segmentIndex: number
  localFrame: number
}

// Walk the cumulative segment lengths to find the segment owning `globalFrame`.
const segmentAddressForFrame = (
  partLengths: readonly number[],
  globalFrame: number
): SegmentAddress => {
  if (!Number.isInteger(globalFrame) || globalFrame < 0) {
    throw new RangeError(`Invalid global frame index ${globalFrame}`)
  }
  let preceding = 0
  for (let segmentIndex = 0; segmentIndex < partLengths.length; segmentIndex++) {
    const partLength = partLengths[segmentIndex]
    if (globalFrame < preceding + partLength) {
      return { segmentIndex, localFrame: globalFrame - preceding }
    }
    preceding += partLength
  }
  throw new RangeError(
    `Global frame ${globalFrame} is beyond the ${preceding} frames of ${partLengths.length} segments`
  )
}

const globalFrameForAddress = (
  partLengths: readonly number[],
  address: SegmentAddress
): number =>
  partLengths.slice(0, address.segmentIndex).reduce((sum, len) => sum + len, 0) +
  address.localFrame

const framesInMatrix = (matrix: ConditionMatrix): number =>
  matrix.length > 0 ? matrix[0].length : 0

/**
 * Find the first frame (along the concatenated frame axis of all segments) on
 * which any condition is true.
 *
 * Simultaneous conditions on the same frame are resolved in favour of the
 * lowest condition index. Conditions are expected to be mutually exclusive,
 * so this only matters for misconfigured states.
 *
 * @returns null if no condition holds anywhere
 */
const locateFirstTrueFrame = (matrices: readonly ConditionMatrix[]): FrameAddress | null => {
  const partLengths = matrices.map(framesInMatrix)
  let offset = 0
  for (let segmentIndex = 0; segmentIndex < matrices.length; segmentIndex++) {
    const matrix = matrices[segmentIndex]
    for (let localFrame = 0; localFrame < partLengths[segmentIndex]; localFrame++) {
      const conditionIndex = matrix.findIndex((row) => row[localFrame])
      if (conditionIndex !== -1) {
        const globalFrame = offset + localFrame
        return {
          conditionIndex,
          globalFrame,
          ...segmentAddressForFrame(partLengths, globalFrame)
        }
      }
    }
    offset += partLengths[segmentIndex]
  }
  return null
}

/** Same as {@link locateFirstTrueFrame} for a single condition per segment. */
const locateFirstTrueFrameOfVectors = (
  vectors: readonly boolean[][],
  conditionIndex = 0
): FrameAddress | null => {
  const address = locateFirstTrueFrame(vectors.map((v) => [v]))
  return address ? { ...address, conditionIndex } : null
}

export {
  segmentAddressForFrame,
  globalFrameForAddress,
  locateFirstTrueFrame,
  locateFirstTrueFrameOfVectors
}
