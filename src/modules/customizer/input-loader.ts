import fs from 'node:fs/promises'
import { FileReadError, type FileReadFailure } from './errors'

// fatal: reject malformed byte sequences instead of substituting U+FFFD
const utf8 = new TextDecoder('utf-8', { fatal: true })

function classifyReadFailure(err: unknown): FileReadFailure {
  if (!(err instanceof Error) || !('code' in err)) return 'other'
  switch (err.code) {
    case 'ENOENT':
      return 'not_found'
    case 'EACCES':
    case 'EPERM':
      return 'permission_denied'
    case 'EISDIR':
      return 'is_directory'
    default:
      return 'other'
  }
}

/** Read a whole file as UTF-8 text. A leading byte-order mark is dropped. */
export async function readTextFile(filePath: string): Promise<string> {
  let buffer: Buffer
  try {
    buffer = await fs.readFile(filePath)
  } catch (err) {
    throw new FileReadError(filePath, classifyReadFailure(err), err)
  }

  try {
    return utf8.decode(buffer)
  } catch (err) {
    throw new FileReadError(filePath, 'invalid_encoding', err)
  }
}
