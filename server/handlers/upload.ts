import path from "path";
import { createWriteStream } from "fs";
import { pipeline } from "stream/promises";
import { nextFilePart } from "../lib/multipart.js";
import type { FilePart } from "../lib/multipart.js";
import { uploadFileName } from "../lib/paths.js";
import { endWithStatus } from "../lib/respond.js";
import type { Handler } from "../lib/types.js";

/** Form field the upload page posts the file under. */
export const UPLOAD_FIELD = "file";

export function createUploadHandler(outputDir: string): Handler {
  return async (req, res) => {
    let part: FilePart | null;
    try {
      part = await nextFilePart(req, (fieldName) => fieldName === UPLOAD_FIELD);
    } catch (err) {
      console.error("[upload] Unable to read multipart form data:", err);
      endWithStatus(res, 400);
      return;
    }

    if (!part) {
      endWithStatus(res, 400);
      return;
    }

    const fileName = uploadFileName(part.fileName);
    if (!fileName) {
      console.error(`[upload] Rejected file name "${part.fileName}"`);
      part.stream.resume();
      endWithStatus(res, 400);
      return;
    }

    const outputPath = path.join(outputDir, fileName);
    console.log(`[upload] Receiving "${part.fileName}", writing to ${outputPath}`);

    try {
      await pipeline(part.stream, createWriteStream(outputPath));
    } catch (err) {
      console.error(`[upload] Unable to write ${outputPath}:`, err);
      // Stop parsing and let the rest of the body drain.
      req.unpipe();
      req.resume();
      endWithStatus(res, 500);
      return;
    }

    res.writeHead(302, { Location: "/", "Content-Length": "0" });
    res.end();
  };
}
