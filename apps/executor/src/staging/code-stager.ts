import fs from "node:fs/promises";
import path from "node:path";
import { pack } from "tar-stream";
import type { Readable } from "node:stream";
import type { SandboxHandle, SandboxProvider } from "@code-exec/sandbox-core";
import { StagingError, ValidationError, describeError } from "../errors.js";
import { createLogger, LogLevel } from "../utils/logger.js";

const logger = createLogger(LogLevel.INFO, "CodeStager");

const SAFE_FILE_NAME = /^[A-Za-z0-9._-]+$/;
const MAX_FILE_NAME_LENGTH = 255;
const FILE_MODE = 0o644;

export interface SubmittedFile {
  name: string;
  content: Buffer;
}

export interface StagedFile {
  name: string;
  content: Buffer;
}

export interface CodeBundle {
  files: ReadonlyArray<StagedFile>;
  archive: Buffer;
}

export interface StagingArea {
  path: string;
  dispose(): Promise<void>;
}

/**
 * Reduces a client supplied file name to a bare base name that is safe to
 * place in the sandbox working directory and to pass on a command line.
 */
export function sanitizeFileName(rawName: string): string {
  const segments = rawName.split(/[\\/]+/).filter((segment) => segment.length > 0);
  const baseName = segments[segments.length - 1] ?? "";

  if (!baseName || baseName === "." || baseName === "..") {
    throw new ValidationError(`Invalid file name: "${rawName}"`);
  }
  if (baseName.length > MAX_FILE_NAME_LENGTH) {
    throw new ValidationError(`File name is too long: "${rawName}"`);
  }
  if (!SAFE_FILE_NAME.test(baseName) || baseName.startsWith("-")) {
    throw new ValidationError(
      `File name "${rawName}" may only contain letters, digits, ".", "_" and "-"`,
    );
  }
  return baseName;
}

function collectArchive(archive: Readable): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const chunks: Buffer[] = [];
    archive.on("data", (chunk: Buffer) => chunks.push(chunk));
    archive.on("end", () => resolve(Buffer.concat(chunks)));
    archive.on("error", (error: Error) => reject(error));
  });
}

export class CodeStager {
  constructor(
    private readonly provider: SandboxProvider,
    private readonly options: { workingDir: string; stagingRoot: string },
  ) {}

  async createBundle(files: ReadonlyArray<SubmittedFile>): Promise<CodeBundle> {
    if (files.length === 0) {
      throw new ValidationError("No files provided");
    }

    const staged: StagedFile[] = [];
    const seen = new Set<string>();
    for (const file of files) {
      const name = sanitizeFileName(file.name);
      if (seen.has(name)) {
        throw new ValidationError(`Duplicate file name: "${name}"`);
      }
      seen.add(name);
      staged.push({ name, content: file.content });
    }

    const archive = pack();
    const collected = collectArchive(archive);
    for (const file of staged) {
      archive.entry(
        { name: file.name, type: "file", mode: FILE_MODE, size: file.content.length },
        file.content,
      );
    }
    archive.finalize();

    try {
      return { files: staged, archive: await collected };
    } catch (error) {
      throw new StagingError(`Failed to build code archive: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  async inject(bundle: CodeBundle, sandbox: SandboxHandle): Promise<void> {
    try {
      await this.provider.injectArchive(
        sandbox,
        this.options.workingDir,
        bundle.archive,
      );
    } catch (error) {
      throw new StagingError(
        `Failed to copy code into sandbox ${sandbox.id}: ${describeError(error)}`,
        { cause: error },
      );
    }
    logger.debug("Injected code bundle", {
      sandboxId: sandbox.id,
      files: bundle.files.map((file) => file.name),
    });
  }

  /**
   * Writes the bundle's files into a new host directory so that a fresh
   * sandbox can bind-mount it. The directory lives until `dispose()`.
   */
  async materialize(bundle: CodeBundle, sessionId: string): Promise<StagingArea> {
    const directory = await this.createDirectory(sessionId);
    try {
      for (const file of bundle.files) {
        await fs.writeFile(path.join(directory, file.name), file.content, {
          mode: FILE_MODE,
        });
      }
    } catch (error) {
      await removeDirectory(directory);
      throw new StagingError(
        `Failed to write staged files: ${describeError(error)}`,
        { cause: error },
      );
    }

    let disposed = false;
    return {
      path: directory,
      dispose: async () => {
        if (disposed) return;
        disposed = true;
        await removeDirectory(directory);
      },
    };
  }

  private async createDirectory(sessionId: string): Promise<string> {
    try {
      await fs.mkdir(this.options.stagingRoot, { recursive: true });
      const directory = await fs.mkdtemp(
        path.join(this.options.stagingRoot, `session-${sessionId}-`),
      );
      // mkdtemp creates 0700; the sandbox user needs to read the mount
      await fs.chmod(directory, 0o755);
      return directory;
    } catch (error) {
      throw new StagingError(
        `Failed to prepare staging directory: ${describeError(error)}`,
        { cause: error },
      );
    }
  }
}

async function removeDirectory(directory: string): Promise<void> {
  try {
    await fs.rm(directory, { recursive: true, force: true });
  } catch (error) {
    logger.warn("Failed to remove staging directory", {
      directory,
      error: describeError(error),
    });
  }
}
