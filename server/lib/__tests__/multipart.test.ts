import { describe, it, expect, vi } from "vitest";
import { Readable } from "stream";
import { MultipartError, nextFilePart } from "../multipart.js";

const BOUNDARY = "XBOUNDARY";

function formBody(...parts: string[]): string {
  return parts.map((part) => `--${BOUNDARY}\r\n${part}\r\n`).join("") + `--${BOUNDARY}--\r\n`;
}

function field(name: string, value: string): string {
  return `Content-Disposition: form-data; name="${name}"\r\n\r\n${value}`;
}

function file(name: string, fileName: string, content: string): string {
  return (
    `Content-Disposition: form-data; name="${name}"; filename="${fileName}"\r\n` +
    `Content-Type: text/plain\r\n\r\n${content}`
  );
}

function source(body: string, contentType = `multipart/form-data; boundary=${BOUNDARY}`) {
  return Object.assign(Readable.from([Buffer.from(body)]), {
    headers: { "content-type": contentType },
  });
}

async function readAll(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

const isFile = (fieldName: string) => fieldName === "file";

describe("nextFilePart", () => {
  it("skips fields and other file parts until one is accepted", async () => {
    const body = formBody(
      field("note", "hi"),
      file("other", "skip.txt", "skip"),
      file("file", "docs/hello.txt", "hello")
    );

    const part = await nextFilePart(source(body), isFile);

    expect(part).not.toBeNull();
    expect(part?.fieldName).toBe("file");
    expect(part?.fileName).toBe("docs/hello.txt");
    expect(part?.mimeType).toBe("text/plain");
    expect(part ? await readAll(part.stream) : null).toBe("hello");
  });

  it("takes only the first accepted part", async () => {
    const body = formBody(file("file", "first.txt", "one"), file("file", "second.txt", "two"));

    const part = await nextFilePart(source(body), isFile);

    expect(part?.fileName).toBe("first.txt");
    expect(part ? await readAll(part.stream) : null).toBe("one");
  });

  it("resolves null when nothing is accepted", async () => {
    const body = formBody(field("note", "hi"), file("other", "skip.txt", "skip"));
    await expect(nextFilePart(source(body), isFile)).resolves.toBeNull();
  });

  it("rejects when the first accepted part is a plain field", async () => {
    const body = formBody(field("file", "not a file"), file("file", "later.txt", "later"));
    await expect(nextFilePart(source(body), isFile)).rejects.toThrow(
      'Field "file" carries no file'
    );
  });

  it("errors the taken part when the body breaks off", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const body = new Readable({ read() {} });
    const pending = nextFilePart(
      Object.assign(body, {
        headers: { "content-type": `multipart/form-data; boundary=${BOUNDARY}` },
      }),
      isFile
    );
    body.push(Buffer.from(`--${BOUNDARY}\r\n${file("file", "partial.bin", "partial")}`));

    const part = await pending;
    if (!part) throw new Error("expected a file part");
    body.destroy(new Error("connection reset"));

    await expect(readAll(part.stream)).rejects.toThrow("connection reset");
  });

  it("rejects bodies that are not multipart", async () => {
    await expect(nextFilePart(source("hello", "text/plain"), isFile)).rejects.toBeInstanceOf(
      MultipartError
    );
  });

  it("rejects a multipart content type without a boundary", async () => {
    await expect(
      nextFilePart(source(formBody(field("note", "hi")), "multipart/form-data"), isFile)
    ).rejects.toBeInstanceOf(MultipartError);
  });

  it("rejects a body that ends mid-form", async () => {
    const truncated = `--${BOUNDARY}\r\n${field("note", "hi")}`;
    await expect(nextFilePart(source(truncated), isFile)).rejects.toBeInstanceOf(MultipartError);
  });
});
