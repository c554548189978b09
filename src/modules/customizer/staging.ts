import fs from 'node:fs/promises'
import path from 'node:path'
import { randomBytes } from 'node:crypto'
import { StagingError } from './errors'

function buildStagingFilename(): string {
  // 6 random bytes keep concurrent runs from colliding in a shared temp dir
  return `resume-${randomBytes(6).toString('hex')}.yml`
}

/**
 * Write the transformed YAML to a fresh file under `stagingDir` and return its path.
 * The file is never removed.
 */
export async function stageTransformationResult(content: string, stagingDir: string): Promise<string> {
  const stagingPath = path.join(path.resolve(stagingDir), buildStagingFilename())
  try {
    await fs.mkdir(path.dirname(stagingPath), { recursive: true })
    await fs.writeFile(stagingPath, content, { encoding: 'utf8', flag: 'wx' })
  } catch (err) {
    throw new StagingError(stagingPath, err)
  }
  return stagingPath
}
