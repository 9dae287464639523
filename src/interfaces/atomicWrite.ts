import fsp from 'fs/promises'
import path from 'path'

/**
 * Writes through a sibling temp file and a rename, so readers see either the previous
 * file or the complete new one. Creates the parent directory.
 */
export async function atomicWrite(filePath: string, data: string | Buffer) {
  const dir = path.dirname(filePath)
  await fsp.mkdir(dir, { recursive: true })
  const tmp = path.join(dir, `.${path.basename(filePath)}.${process.pid}.partial`)
  if (Buffer.isBuffer(data)) {
    await fsp.writeFile(tmp, data)
  } else {
    await fsp.writeFile(tmp, data, 'utf8')
  }
  await fsp.rename(tmp, filePath)
  return filePath
}
