import { mkdir } from 'node:fs/promises'
import { join } from 'node:path'
import { OUTPUT_DIR } from '../constants.js'

let runDirAbsolute: string | null = null

export function generateRunId(now = new Date()): string {
  const pad = (number: number) => String(number).padStart(2, '0')

  const year = now.getFullYear()
  const month = pad(now.getMonth() + 1)
  const day = pad(now.getDate())
  const hours = pad(now.getHours())
  const minutes = pad(now.getMinutes())
  const seconds = pad(now.getSeconds())

  return `${year}-${month}-${day}_${hours}-${minutes}-${seconds}`
}

export async function initRunDir(baseDir = join(process.cwd(), OUTPUT_DIR)): Promise<string> {
  runDirAbsolute = join(baseDir, generateRunId())

  await mkdir(runDirAbsolute, { recursive: true })

  return runDirAbsolute
}

export function getRunDir(): string {
  if (runDirAbsolute === null) {
    throw new Error('Run directory not initialized. Call initRunDir() first.')
  }

  return runDirAbsolute
}
