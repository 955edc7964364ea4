import fs, { type Stats } from 'fs'
import path from 'path'
import { z } from 'zod'
import { defineTool, type ToolDefinition } from '../../types'

// Every path argument resolves inside `root`; anything escaping it is refused
export function createSafePath(root: string): (relativePath: string) => string {
    const base = path.resolve(root)
    return (relativePath: string) => {
        const resolved = path.resolve(base, relativePath)
        if (resolved !== base && !resolved.startsWith(base + path.sep)) {
            throw new Error('Path traversal attempt blocked.')
        }
        return resolved
    }
}

async function statOrNull(target: string): Promise<Stats | null> {
    try {
        return await fs.promises.stat(target)
    } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null
        throw err
    }
}

async function walkFiles(dir: string): Promise<string[]> {
    const entries = await fs.promises.readdir(dir, { withFileTypes: true })
    const nested = await Promise.all(entries.map(async entry => {
        const full = path.join(dir, entry.name)
        if (entry.isDirectory()) return walkFiles(full)
        return entry.isFile() ? [full] : []
    }))
    return nested.flat()
}

export function createFilesystemTools(root: string): ToolDefinition[] {
    const safePath = createSafePath(root)

    const requireDir = async (p: string) => {
        const target = safePath(p)
        const stats = await statOrNull(target)
        if (!stats?.isDirectory()) throw new Error(`Not a directory: ${p}`)
        return target
    }

    const requireFile = async (p: string) => {
        const target = safePath(p)
        const stats = await statOrNull(target)
        if (!stats?.isFile()) throw new Error(`Not a file: ${p}`)
        return target
    }

    const readHead = async (target: string, maxBytes: number) => {
        const data = await fs.promises.readFile(target)
        return data.subarray(0, maxBytes).toString('utf8')
    }

    const listDir = defineTool({
        name: 'list_dir',
        description: 'List the entry names of a directory.',
        category: 'files',
        inputSchema: z.object({
            path: z.string().describe('Directory path'),
        }).strict(),

        async execute({ path: dirPath }) {
            const target = await requireDir(dirPath)
            return (await fs.promises.readdir(target)).sort()
        },
    })

    const readText = defineTool({
        name: 'read_text',
        description: 'Read the beginning of a text file.',
        category: 'files',
        inputSchema: z.object({
            path: z.string().describe('File path'),
            max_bytes: z.number().int().positive().default(4096).describe('Max bytes to read (default: 4096)'),
        }).strict(),

        async execute({ path: filePath, max_bytes }) {
            return readHead(await requireFile(filePath), max_bytes)
        },
    })

    const listFiles = defineTool({
        name: 'list_files',
        description: 'List the files (not directories) under a directory, optionally recursively.',
        category: 'files',
        inputSchema: z.object({
            path: z.string().describe('Directory path'),
            recursive: z.boolean().default(false).describe('Descend into subdirectories'),
        }).strict(),

        async execute({ path: dirPath, recursive }) {
            const target = await requireDir(dirPath)
            if (recursive) return (await walkFiles(target)).sort()

            const entries = await fs.promises.readdir(target, { withFileTypes: true })
            return entries.filter(e => e.isFile()).map(e => path.join(target, e.name)).sort()
        },
    })

    const readFile = defineTool({
        name: 'read_file',
        description: 'Read a text file (up to max_bytes).',
        category: 'files',
        inputSchema: z.object({
            path: z.string().describe('File path'),
            max_bytes: z.number().int().positive().default(1_000_000).describe('Max bytes to read (default: 1000000)'),
        }).strict(),

        async execute({ path: filePath, max_bytes }) {
            return readHead(await requireFile(filePath), max_bytes)
        },
    })

    const writeFile = defineTool({
        name: 'write_file',
        description: 'Write text to a file. Refuses to overwrite unless allow_overwrite is true.',
        category: 'files',
        inputSchema: z.object({
            path: z.string().describe('File path'),
            content: z.string().describe('Text to write'),
            allow_overwrite: z.boolean().default(false).describe('Replace an existing file'),
            create_parents: z.boolean().default(true).describe('Create missing parent directories'),
        }).strict(),

        async execute({ path: filePath, content, allow_overwrite, create_parents }) {
            const target = safePath(filePath)
            const stats = await statOrNull(target)
            if (stats?.isDirectory()) throw new Error(`Target is a directory: ${filePath}`)
            if (stats && !allow_overwrite) throw new Error(`Refusing to overwrite existing file: ${filePath}`)
            if (!stats && create_parents) await fs.promises.mkdir(path.dirname(target), { recursive: true })

            await fs.promises.writeFile(target, content, 'utf8')
            return target
        },
    })

    const deleteFile = defineTool({
        name: 'delete_file',
        description: 'Delete a single file. Requires confirm=true.',
        category: 'files',
        inputSchema: z.object({
            path: z.string().describe('File path'),
            confirm: z.boolean().default(false).describe('Must be true to delete'),
        }).strict(),

        async execute({ path: filePath, confirm }) {
            if (!confirm) throw new Error('Deletion requires confirm=true to proceed')
            const target = safePath(filePath)
            const stats = await statOrNull(target)
            if (!stats) return false
            if (stats.isDirectory()) throw new Error('Refusing to delete a directory with this tool')

            await fs.promises.unlink(target)
            return true
        },
    })

    return [listDir, readText, listFiles, readFile, writeFile, deleteFile]
}
