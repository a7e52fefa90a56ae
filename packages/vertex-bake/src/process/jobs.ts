import {
  bakeFrames,
  bakeShapeKeys,
  type FrameBakeConfig,
  type FrameBakeOutput,
  type ShapeKeyBakeConfig,
  type ShapeKeyBakeOutput,
} from '@vertex-bake/deform-codec'
import { ResultAsync } from 'neverthrow'
import { writeFrameBakeOutput, writeShapeKeyBakeOutput } from '../io/export'
import { parseFrameBakeJob, parseShapeKeyBakeJob, readJobFile } from '../io/job'
import type { VertexBakeError } from '../types'

export interface JobResult<T>
{
  output: T
  files: string[]
}

/**
 * frames ジョブを読み込み、焼き込んでファイルに書き出す
 * ジョブの name は config.outputName が無い場合のみ使う
 */
export function runFrameBakeJob(
  jobPath: string,
  outputDirectory: string,
  config: FrameBakeConfig = {},
): ResultAsync<JobResult<FrameBakeOutput>, VertexBakeError>
{
  return readJobFile(jobPath)
    .andThen(parseFrameBakeJob)
    .andThen((job) => bakeFrames(job, { ...config, outputName: config.outputName ?? job.name }))
    .andThen((output) =>
      writeFrameBakeOutput(output, outputDirectory, {
        convention: config.convention ?? 'SOURCE_NATIVE',
        targetUnit: config.targetUnit ?? 'CM',
      }).map((files) => ({ output, files })),
    )
}

/**
 * shape-keys ジョブを読み込み、焼き込んでファイルに書き出す
 */
export function runShapeKeyBakeJob(
  jobPath: string,
  outputDirectory: string,
  config: ShapeKeyBakeConfig = {},
): ResultAsync<JobResult<ShapeKeyBakeOutput>, VertexBakeError>
{
  return readJobFile(jobPath)
    .andThen(parseShapeKeyBakeJob)
    .andThen((job) =>
      bakeShapeKeys(job, config).asyncAndThen((output) =>
        writeShapeKeyBakeOutput(job.name, output, outputDirectory).map((files) => ({ output, files })),
      ),
    )
}
