import busboy from "busboy";
import type { IncomingHttpHeaders } from "http";
import type { Readable } from "stream";

/** A file part taken from a multipart body. `stream` must be consumed. */
export interface FilePart {
  fieldName: string;
  /** File name as declared by the client, path included. */
  fileName: string;
  mimeType: string;
  stream: Readable;
}

/** A request body plus the headers that describe it. */
export type MultipartSource = Readable & { headers: IncomingHttpHeaders };

export class MultipartError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MultipartError";
  }
}

/**
 * Walk the parts of a multipart/form-data body and hand back the first part
 * whose field name passes `accept`. Parts before it are drained; parts after
 * it are drained as the parser reaches them. If the body breaks off after the
 * part was handed back, its stream is destroyed with the error.
 *
 * Resolves null when the body ends without a match. Rejects with
 * MultipartError when the body is not multipart or is malformed, or when the
 * first accepted part is a plain field rather than a file.
 */
export function nextFilePart(
  source: MultipartSource,
  accept: (fieldName: string) => boolean
): Promise<FilePart | null> {
  return new Promise((resolve, reject) => {
    const contentType = source.headers["content-type"] ?? "";
    if (!/^multipart\/form-data\b/i.test(contentType)) {
      reject(new MultipartError(`Expected multipart/form-data, got "${contentType}"`));
      return;
    }

    let parser: ReturnType<typeof busboy>;
    try {
      parser = busboy({ headers: source.headers, preservePath: true });
    } catch (err) {
      reject(new MultipartError("Unable to read multipart form data", { cause: err }));
      return;
    }

    let settled = false;
    let taken: Readable | null = null;
    let failed = false;
    const fail = (err: unknown) => {
      if (failed) return;
      failed = true;
      const cause = err instanceof Error ? err : new Error(String(err));
      parser.destroy();
      if (settled) {
        // The taken part can no longer complete; end it so its consumer does.
        console.error("[multipart] Body failed after a part was taken:", cause);
        taken?.destroy(cause);
        return;
      }
      settled = true;
      reject(new MultipartError("Malformed multipart body", { cause }));
    };

    parser.on(
      "file",
      (fieldName: string, stream: Readable, info: { filename: string; mimeType: string }) => {
        if (settled || !accept(fieldName)) {
          stream.resume();
          return;
        }
        settled = true;
        taken = stream;
        resolve({
          fieldName,
          fileName: info.filename,
          mimeType: info.mimeType,
          stream,
        });
      }
    );
    parser.on("field", (fieldName: string) => {
      if (settled || !accept(fieldName)) return;
      settled = true;
      reject(new MultipartError(`Field "${fieldName}" carries no file`));
    });
    parser.on("error", fail);
    parser.on("close", () => {
      if (!settled) {
        settled = true;
        resolve(null);
      }
    });
    source.on("error", fail);
    source.on("close", () => {
      if (!source.readableEnded) {
        fail(new MultipartError("Request body ended early"));
      }
    });

    source.pipe(parser);
  });
}
