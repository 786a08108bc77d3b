import path from 'path'
import { glob } from 'glob'
import { logger } from '../../helpers/loggers.js'
import type { MDEngine } from '../../types/engine.js'
import type { Trajectory } from '../../types/trajectory.js'

export type SegmentLister = (
  folder: string,
  deffnm: string,
  engine: MDEngine
) => Promise<Trajectory[]>

const partSuffix = (part: number): string => `.part${String(part).padStart(4, '0')}`

const segmentFileName = (deffnm: string, part: number, trajType: string): string =>
  `${deffnm}${partSuffix(part)}.${trajType}`

const escapeRegExp = (s: string): string => s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')

// All `<deffnm>.partNNNN.<ext>` files of `engine`'s trajectory type, by part number.
const listSegmentFiles = async (
  folder: string,
  deffnm: string,
  trajType: string
): Promise<string[]> => {
  const partRe = new RegExp(`^${escapeRegExp(deffnm)}\\.part(\\d+)\\.${escapeRegExp(trajType)}$`)
  const candidates = await glob(`${deffnm}.part*.${trajType}`, { cwd: folder, nodir: true })
  return candidates
    .map((file) => {
      const match = path.basename(file).match(partRe)
      return match ? { file, part: parseInt(match[1], 10) } : null
    })
    .filter((c): c is { file: string; part: number } => c !== null)
    .sort((a, b) => a.part - b.part)
    .map(({ file }) => path.join(folder, file))
}

const listExistingSegments: SegmentLister = async (folder, deffnm, engine) => {
  const trajType = engine.outputTrajType.toLowerCase()
  const files = await listSegmentFiles(folder, deffnm, trajType)
  logger.info(`Found ${files.length} existing ${trajType} segments for ${deffnm} in ${folder}`)
  const segments: Trajectory[] = []
  for (const file of files) {
    segments.push(await engine.openSegment(file, deffnm))
  }
  return segments
}

export { partSuffix, segmentFileName, listSegmentFiles, listExistingSegments }
