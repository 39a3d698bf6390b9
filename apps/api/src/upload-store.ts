import fs from "node:fs/promises";
import path from "node:path";
import type { Logger } from "@docqa/logger";

/**
 * Original uploads on disk, one file per document named
 * `<documentId><extension>`. Files outlive their index entries: deleting a
 * document leaves its upload in place as an audit trail.
 */
export class UploadStore {
  readonly directory: string;

  constructor(
    directory: string,
    private readonly logger?: Logger,
  ) {
    this.directory = path.resolve(directory);
  }

  pathFor(documentId: string, extension: string): string {
    return path.join(this.directory, `${documentId}${extension}`);
  }

  async save(documentId: string, extension: string, content: Uint8Array): Promise<string> {
    const filePath = this.pathFor(documentId, extension);
    await fs.mkdir(this.directory, { recursive: true });
    await fs.writeFile(filePath, content);
    this.logger?.debug({ documentId, filePath, bytes: content.byteLength }, "Stored upload");
    return filePath;
  }

  async remove(filePath: string): Promise<void> {
    await fs.rm(filePath, { force: true });
    this.logger?.debug({ filePath }, "Removed upload");
  }
}
