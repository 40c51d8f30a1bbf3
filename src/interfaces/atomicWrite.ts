import fsp from 'fs/promises'
import path from 'path'

/** Write to a sibling `.partial` file, then rename over the target. */
export async function atomicWrite(filePath: string, data: string) {
  const dir = path.dirname(filePath)
  const tmp = path.join(dir, `.${path.basename(filePath)}.partial`)
  await fsp.mkdir(dir, { recursive: true })
  await fsp.writeFile(tmp, data, 'utf8')
  await fsp.rename(tmp, filePath)
}

export async function writeJSON(filePath: string, value: unknown) {
  await atomicWrite(filePath, JSON.stringify(value, null, 2) + '\n')
}
