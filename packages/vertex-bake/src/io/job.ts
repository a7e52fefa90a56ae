/**
 * CLI 用のジョブファイル (JSON) の読み込み
 *
 * frames ジョブ:
 * {
 *   "name": "Flag",
 *   "objects": [{ "name": "Flag", "vertexCount": 4, "modifiers": ["ARMATURE"],
 *                 "vertexGroups": { "Cloth": [0, 1] }, "loops": [0, 1, 2, 3] }],
 *   "frames": [{ "label": "1", "positions": [...], "normals": [...] }]
 * }
 *
 * shape-keys ジョブ:
 * {
 *   "name": "Face",
 *   "units": { "system": "METRIC", "scaleLength": 0.01 },
 *   "loops": [...],
 *   "shapeKeys": [{ "label": "Basis", "positions": [...], "normals": [...] }]
 * }
 */

import {
  createSnapshot,
  type FrameBakeInput,
  type FrameBakeObject,
  type SceneUnitSettings,
  type ShapeKeyBakeInput,
  type Snapshot,
  type VertexGroupTable,
} from '@vertex-bake/deform-codec'
import { readFile } from 'fs/promises'
import { err, ok, Result, ResultAsync, safeTry } from 'neverthrow'
import type { VertexBakeError } from '../types'

export interface FrameBakeJob extends FrameBakeInput
{
  name?: string
}

type JsonRecord = Record<string, unknown>

function invalid(message: string): Result<never, VertexBakeError>
{
  return err({ type: 'INVALID_JOB', message })
}

function isRecord(value: unknown): value is JsonRecord
{
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isNumberArray(value: unknown): value is number[]
{
  return Array.isArray(value) && value.every((v) => typeof v === 'number' && Number.isFinite(v))
}

function isStringArray(value: unknown): value is string[]
{
  return Array.isArray(value) && value.every((v) => typeof v === 'string')
}

function isIndexArray(value: unknown): value is number[]
{
  return isNumberArray(value) && value.every((v) => Number.isInteger(v) && v >= 0)
}

function parseRecord(value: unknown, where: string): Result<JsonRecord, VertexBakeError>
{
  return isRecord(value) ? ok(value) : invalid(`${where} must be an object`)
}

function parseList(value: unknown, where: string): Result<unknown[], VertexBakeError>
{
  return Array.isArray(value) ? ok(value) : invalid(`${where} must be an array`)
}

function parseSnapshot(value: unknown, where: string): Result<Snapshot, VertexBakeError>
{
  return safeTry<Snapshot, VertexBakeError>(function* () {
    const record = yield* parseRecord(value, where)
    const label = typeof record.label === 'string' ? record.label : where

    if (!isNumberArray(record.positions))
    {
      return invalid(`${where}.positions must be an array of numbers`)
    }
    if (record.normals !== undefined && !isNumberArray(record.normals))
    {
      return invalid(`${where}.normals must be an array of numbers`)
    }

    const normals = isNumberArray(record.normals) ? record.normals : undefined
    return createSnapshot(label, record.positions, normals)
  })
}

function parseSnapshots(value: unknown, where: string): Result<Snapshot[], VertexBakeError>
{
  return parseList(value, where).andThen((items) =>
    Result.combine(items.map((item, i) => parseSnapshot(item, `${where}[${i}]`))),
  )
}

function identityLoops(vertexCount: number): Uint32Array
{
  return Uint32Array.from({ length: vertexCount }, (_, i) => i)
}

function parseLoops(value: unknown, vertexCount: number, where: string): Result<Uint32Array, VertexBakeError>
{
  if (value === undefined) return ok(identityLoops(vertexCount))
  return isIndexArray(value)
    ? ok(Uint32Array.from(value))
    : invalid(`${where} must be an array of vertex indices`)
}

/**
 * { グループ名: 所属頂点インデックス[] } を VertexGroupTable にする
 */
function parseVertexGroups(
  value: unknown,
  vertexCount: number,
  where: string,
): Result<VertexGroupTable | undefined, VertexBakeError>
{
  if (value === undefined) return ok(undefined)
  if (!isRecord(value)) return invalid(`${where} must be an object`)

  const names = Object.keys(value)
  const memberships: number[][] = Array.from({ length: vertexCount }, () => [])

  for (const [groupIndex, name] of names.entries())
  {
    const members = value[name]
    if (!isIndexArray(members))
    {
      return invalid(`${where}.${name} must be an array of vertex indices`)
    }
    const outOfRange = members.find((v) => v >= vertexCount)
    if (outOfRange !== undefined)
    {
      return invalid(`${where}.${name} refers to vertex ${outOfRange}, but only ${vertexCount} vertices exist`)
    }
    members.forEach((v) => memberships[v].push(groupIndex))
  }

  return ok({ names, memberships })
}

function parseObject(value: unknown, where: string): Result<FrameBakeObject, VertexBakeError>
{
  return safeTry<FrameBakeObject, VertexBakeError>(function* () {
    const record = yield* parseRecord(value, where)

    if (typeof record.name !== 'string')
    {
      return invalid(`${where}.name must be a string`)
    }
    const vertexCount = record.vertexCount
    if (typeof vertexCount !== 'number' || !Number.isInteger(vertexCount) || vertexCount < 0)
    {
      return invalid(`${where}.vertexCount must be a non-negative integer`)
    }
    if (record.modifiers !== undefined && !isStringArray(record.modifiers))
    {
      return invalid(`${where}.modifiers must be an array of strings`)
    }

    const modifiers = isStringArray(record.modifiers) ? record.modifiers : undefined
    const vertexGroups = yield* parseVertexGroups(record.vertexGroups, vertexCount, `${where}.vertexGroups`)
    const loopVertexIndices = yield* parseLoops(record.loops, vertexCount, `${where}.loops`)

    return ok({ name: record.name, vertexCount, modifiers, vertexGroups, loopVertexIndices })
  })
}

function parseUnits(value: unknown, where: string): Result<SceneUnitSettings | undefined, VertexBakeError>
{
  if (value === undefined) return ok(undefined)
  if (!isRecord(value)) return invalid(`${where} must be an object`)

  const { system, scaleLength } = value
  if (system !== 'METRIC' && system !== 'IMPERIAL' && system !== 'NONE')
  {
    return invalid(`${where}.system must be one of METRIC, IMPERIAL, NONE`)
  }
  if (typeof scaleLength !== 'number')
  {
    return invalid(`${where}.scaleLength must be a number`)
  }
  return ok({ system, scaleLength })
}

/**
 * frames ジョブの JSON 値を検証して焼き込み入力にする
 */
export function parseFrameBakeJob(value: unknown): Result<FrameBakeJob, VertexBakeError>
{
  return safeTry<FrameBakeJob, VertexBakeError>(function* () {
    const record = yield* parseRecord(value, 'job')
    if (record.name !== undefined && typeof record.name !== 'string')
    {
      return invalid('job.name must be a string')
    }

    const objectItems = yield* parseList(record.objects, 'job.objects')
    const objects = yield* Result.combine(objectItems.map((item, i) => parseObject(item, `job.objects[${i}]`)))
    const snapshots = yield* parseSnapshots(record.frames, 'job.frames')

    const name = typeof record.name === 'string' ? record.name : undefined
    return ok({ name, objects, snapshots })
  })
}

/**
 * shape-keys ジョブの JSON 値を検証して焼き込み入力にする
 */
export function parseShapeKeyBakeJob(value: unknown): Result<ShapeKeyBakeInput, VertexBakeError>
{
  return safeTry<ShapeKeyBakeInput, VertexBakeError>(function* () {
    const record = yield* parseRecord(value, 'job')
    if (typeof record.name !== 'string')
    {
      return invalid('job.name must be a string')
    }

    const snapshots = yield* parseSnapshots(record.shapeKeys, 'job.shapeKeys')
    const vertexCount = snapshots.length > 0 ? snapshots[0].vertexCount : 0
    const loopVertexIndices = yield* parseLoops(record.loops, vertexCount, 'job.loops')
    const units = yield* parseUnits(record.units, 'job.units')

    return ok({ name: record.name, snapshots, loopVertexIndices, units })
  })
}

/**
 * JSON ファイルを読み込む
 */
export function readJobFile(filePath: string): ResultAsync<unknown, VertexBakeError>
{
  return ResultAsync.fromPromise(
    readFile(filePath, 'utf-8'),
    (error): VertexBakeError => ({ type: 'IO_ERROR', message: `Failed to read ${filePath}: ${String(error)}` }),
  ).andThen((text) => Result.fromThrowable(
    (): unknown => JSON.parse(text),
    (error): VertexBakeError => ({ type: 'INVALID_JOB', message: `${filePath} is not valid JSON: ${String(error)}` }),
  )())
}
