import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { Injectable, Logger } from "@nestjs/common";

export interface StagedUpload {
  fileName: string;
  path: string;
  release(): Promise<void>;
}

export function safeFileName(originalName: string): string {
  const cleaned = path.basename(originalName).replace(/[^\w.-]/g, "_");
  return cleaned === "" || /^\.+$/.test(cleaned) ? "upload" : cleaned;
}

/**
 * Writes each upload into its own temporary directory so concurrent
 * analyses never share a file.
 */
@Injectable()
export class UploadStorage {
  private readonly logger = new Logger(UploadStorage.name);

  constructor(private readonly root: string = tmpdir()) {}

  async stage(originalName: string, buffer: Buffer): Promise<StagedUpload> {
    const directory = await mkdtemp(path.join(this.root, "authenticity-"));
    const fileName = safeFileName(originalName);
    const filePath = path.join(directory, fileName);
    await writeFile(filePath, buffer);

    return {
      fileName,
      path: filePath,
      release: async () => {
        await rm(directory, { recursive: true, force: true });
        this.logger.debug(`Released upload directory ${directory}`);
      },
    };
  }
}
