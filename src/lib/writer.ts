import { writeFileExclusive } from '../utils/fs';

/** Already-encoded image bytes handed over by the host. */
export interface ImageData {
  bytes: Buffer;
}

export type ImageMetadata = Record<string, unknown>;

/**
 * Encoding boundary. The naming core only supplies the path; pixel encoding
 * and metadata embedding belong to the implementation.
 */
export interface ImageWriter {
  write(image: ImageData, filePath: string, metadata: ImageMetadata | null, quality: number): Promise<void>;
}

/** Writes the given bytes unchanged. Refuses to replace an existing file. */
export class FileCopyWriter implements ImageWriter {
  async write(image: ImageData, filePath: string): Promise<void> {
    await writeFileExclusive(filePath, image.bytes);
  }
}
