import type { Dirent } from "node:fs";
import { mkdir, readFile, readdir, writeFile } from "node:fs/promises";
import { dirname, join, relative, resolve, sep } from "node:path";
import { z } from "zod";
import type { Capability } from "../types/Capability.js";
import { action, defineCapability } from "./defineCapability.js";
import { isNotFoundError, resolveWithinRoot } from "./security/sandbox.js";

export interface MarkdownFileCapabilityOptions {
  /** Root directory every path is resolved against (default: cwd) */
  fileRoot?: string;
}

const MARKDOWN_EXTENSIONS = [".md", ".markdown"];

/**
 * Read, write and list markdown files below a root directory.
 */
export function createMarkdownFileCapability(
  options: MarkdownFileCapabilityOptions = {},
): Capability {
  const fileRoot = resolve(options.fileRoot ?? ".");

  return defineCapability("MarkdownFileAdapter", {
    read_file: action({
      description: "Read a markdown file relative to the file root",
      parameters: z.object({ filename: z.string().min(1) }).strict(),
      run: async ({ filename }) => {
        const path = await resolveWithinRoot(filename, fileRoot);
        try {
          return await readFile(path, "utf-8");
        } catch (error) {
          if (isNotFoundError(error)) throw new Error(`File not found: ${filename}`);
          throw error;
        }
      },
    }),
    write_file: action({
      description: "Write content to a markdown file, creating parent directories",
      parameters: z.object({ filename: z.string().min(1), content: z.string() }).strict(),
      run: async ({ filename, content }) => {
        const path = await resolveWithinRoot(filename, fileRoot);
        await mkdir(dirname(path), { recursive: true });
        await writeFile(path, content, "utf-8");
        return true;
      },
    }),
    get_files: action({
      description: "List markdown files (sorted, relative paths) under the root or a subdirectory",
      parameters: z.object({ file_root: z.string().optional() }).strict(),
      run: async ({ file_root }) => {
        const searchRoot = file_root ? await resolveWithinRoot(file_root, fileRoot) : fileRoot;
        const files = await listMarkdownFiles(searchRoot);
        return files.map((file) => relative(searchRoot, file).split(sep).join("/")).sort();
      },
    }),
  });
}

async function listMarkdownFiles(dir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (isNotFoundError(error)) return [];
    throw error;
  }

  const files: string[] = [];
  for (const entry of entries) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listMarkdownFiles(full)));
    } else if (
      entry.isFile() &&
      MARKDOWN_EXTENSIONS.some((ext) => entry.name.toLowerCase().endsWith(ext))
    ) {
      files.push(full);
    }
  }
  return files;
}
