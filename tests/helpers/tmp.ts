import fs from 'fs/promises'
import os from 'os'
import path from 'path'

/** Helper: a fresh temporary directory populated with the given files */
export async function makeTree(files: Record<string, string>): Promise<string> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'c-header-inventory-'))
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, relative)
    await fs.mkdir(path.dirname(target), { recursive: true })
    await fs.writeFile(target, content)
  }
  return root
}

export async function removeTree(root: string): Promise<void> {
  await fs.rm(root, { recursive: true, force: true })
}
