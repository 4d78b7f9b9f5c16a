import * as fs from 'node:fs/promises'
import * as path from 'node:path'

/**
 *  ## Disk
 *
 *  Shared utilities for reading and saving files to disk.
 */
export namespace Disk {
  /**
   * Reads a UTF-8 text file into lines with trailing CR/LF stripped.
   */
  export async function readLines(filePath: string): Promise<string[]> {
    const text = await fs.readFile(filePath, 'utf-8')
    const lines = text.split(/\r?\n/)
    if (lines.at(-1) === '') lines.pop()
    return lines
  }

  /**
   * Writes lines to a UTF-8 text file with a trailing newline, creating parent directories.
   */
  export async function writeLines(filePath: string, lines: readonly string[]): Promise<string> {
    await ensureDir(path.dirname(filePath))
    await fs.writeFile(filePath, lines.join('\n') + '\n', 'utf-8')
    return filePath
  }

  export async function writeText(filePath: string, text: string): Promise<string> {
    await ensureDir(path.dirname(filePath))
    await fs.writeFile(filePath, text, 'utf-8')
    return filePath
  }

  export async function ensureDir(dir: string): Promise<void> {
    await fs.mkdir(dir, { recursive: true })
  }

  export async function exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath)
      return true
    } catch {
      return false
    }
  }

  /**
   *  Pretty-printed JSON save.
   */
  export async function saveJsonFile<T extends {}>(filePath: string, jsonData: T): Promise<string> {
    await ensureDir(path.dirname(filePath))
    await fs.writeFile(filePath, JSON.stringify(jsonData, null, 2), 'utf-8')
    console.log('[disk] saved:', filePath)
    return filePath
  }

  /**
   *  Loads and parses a JSON file, the caller validates the shape.
   */
  export async function getJsonFile(filePath: string): Promise<unknown> {
    const raw = await fs.readFile(filePath, 'utf-8')
    return JSON.parse(raw)
  }
}
