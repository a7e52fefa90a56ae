#!/usr/bin/env node

import path from 'path'
import { Command } from 'commander'
import { runFrameBakeJob, runShapeKeyBakeJob } from './process/jobs'
import type { VertexBakeError } from './types'

interface FramesCommandOptions {
  output: string
  unit: string
  coord: string
  group?: string
  name?: string
}

interface ShapeKeysCommandOptions {
  output: string
  numShapeKeys: string
  startUv: string
  bakeNormal: boolean
  normalIndex: string
  unit: string
  coord: string
  checkUnits: boolean
}

function fail(error: VertexBakeError): never {
  console.error(`\n❌ Error (${error.type}): ${error.message}`)
  process.exit(1)
}

function parseInteger(value: string, label: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed)) {
    console.error(`❌ Error: ${label} must be an integer`)
    process.exit(1)
  }
  return parsed
}

const program = new Command()

program
  .name('vertex-bake')
  .description('Bake vertex animation and shape keys into textures and UV channels')
  .version('0.1.0')

// Frames command
program
  .command('frames <job>')
  .description('Bake per-frame vertex offsets and normals into textures')
  .option('-o, --output <dir>', 'Output directory', '.')
  .option('--unit <unit>', 'Target unit (MM, CM, DM, M)', 'CM')
  .option('--coord <convention>', 'Coordinate convention (SOURCE_NATIVE, ALT_ENGINE)', 'SOURCE_NATIVE')
  .option('--group <name>', 'Vertex group that narrows the baked vertices')
  .option('--name <name>', 'Name used for the texture files')
  .action(async (job: string, options: FramesCommandOptions) => {
    try {
      const jobPath = path.resolve(job)
      const outputDir = path.resolve(options.output)

      console.log(`📁 Job:    ${jobPath}`)
      console.log(`📁 Output: ${outputDir}`)
      console.log('⚙️  Baking frames...')

      const result = await runFrameBakeJob(jobPath, outputDir, {
        targetUnit: options.unit,
        convention: options.coord,
        groupName: options.group,
        outputName: options.name,
      })
      if (result.isErr()) {
        fail(result.error)
      }

      const { output, files } = result.value
      console.log('💾 Written:')
      files.forEach((file) => console.log(`   ${file}`))
      console.log(`\n✅ Baked ${output.offsetTexture.grid.height} frames x ${output.partition.totalActive} vertices`)
      console.log(`   Max deviation: ${output.maxDeviation}`)
      console.log(`   Scale factor:  ${output.scaleFactor}`)
    } catch (error) {
      console.error(`\n❌ Unexpected error: ${String(error)}`)
      process.exit(1)
    }
  })

// Shape keys command
program
  .command('shape-keys <job>')
  .description('Bake shape key offsets into UV layers')
  .option('-o, --output <dir>', 'Output directory', '.')
  .option('--num-shape-keys <count>', 'Number of shape keys to bake (1-4)', '1')
  .option('--start-uv <index>', 'First UV layer to write (0-7)', '1')
  .option('--no-bake-normal', 'Skip baking normals into the color layer')
  .option('--normal-index <index>', 'Shape key whose normals are baked', '1')
  .option('--unit <unit>', 'Unit used for the deviation report (MM, CM, DM, M)', 'CM')
  .option('--coord <convention>', 'Coordinate convention (SOURCE_NATIVE, ALT_ENGINE)', 'ALT_ENGINE')
  .option('--no-check-units', 'Skip the metric / 0.01 scene unit check')
  .action(async (job: string, options: ShapeKeysCommandOptions) => {
    try {
      const jobPath = path.resolve(job)
      const outputDir = path.resolve(options.output)

      console.log(`📁 Job:    ${jobPath}`)
      console.log(`📁 Output: ${outputDir}`)
      console.log('⚙️  Baking shape keys...')

      const result = await runShapeKeyBakeJob(jobPath, outputDir, {
        numShapeKeys: parseInteger(options.numShapeKeys, 'Shape key count'),
        startLayer: parseInteger(options.startUv, 'Start UV index'),
        bakeNormal: options.bakeNormal,
        normalShapeKeyIndex: parseInteger(options.normalIndex, 'Normal shape key index'),
        targetUnit: options.unit,
        convention: options.coord,
        requireCentimeterScene: options.checkUnits,
      })
      if (result.isErr()) {
        fail(result.error)
      }

      const { output, files } = result.value
      console.log('💾 Written:')
      files.forEach((file) => console.log(`   ${file}`))
      console.log(`\n✅ Wrote ${output.uvLayers.length} UV layers:`)
      output.uvLayers.forEach((layer) => console.log(`   [${layer.ordinal}] ${layer.name}`))
      console.log(`   Max deviation: ${output.maxDeviation}`)
    } catch (error) {
      console.error(`\n❌ Unexpected error: ${String(error)}`)
      process.exit(1)
    }
  })

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`\n❌ Unexpected error: ${String(error)}`)
  process.exit(1)
})
