import { PassThrough, Writable } from "node:stream";
import { describe, expect, it } from "vitest";
import { createStreamSink } from "../src/lib/runtime/sink.js";

function collect(stream: PassThrough): () => Promise<string> {
  const chunks: Buffer[] = [];
  stream.on("data", (c: Buffer) => chunks.push(c));
  return async () => {
    await new Promise((r) => setImmediate(r));
    return Buffer.concat(chunks).toString("utf8");
  };
}

describe("createStreamSink", () => {
  it("writes one newline-terminated line per record in call order", async () => {
    const stream = new PassThrough();
    const read = collect(stream);
    const sink = createStreamSink(stream);
    await Promise.all(["a;1", "b;2", "c;3"].map((r) => sink.write(r)));
    expect(await read()).toBe("a;1\nb;2\nc;3\n");
    expect(sink.written).toBe(3);
  });

  it("flattens embedded line breaks", async () => {
    const stream = new PassThrough();
    const read = collect(stream);
    const sink = createStreamSink(stream);
    await sink.write("x\r\ny\nz");
    expect(await read()).toBe("x y z\n");
  });

  it("writes nothing once aborted", async () => {
    const stream = new PassThrough();
    const read = collect(stream);
    const controller = new AbortController();
    const sink = createStreamSink(stream, { signal: controller.signal });
    await sink.write("before");
    controller.abort();
    await sink.write("after");
    expect(await read()).toBe("before\n");
    expect(sink.written).toBe(1);
  });

  it("rejects a write blocked on drain when the stream fails", async () => {
    // Never calls back, so the buffer stays full and drain never comes.
    const stream = new Writable({ highWaterMark: 1, write: () => undefined });
    const sink = createStreamSink(stream);
    const pending = sink.write("a;1");
    await new Promise((r) => setImmediate(r));
    stream.destroy(new Error("write EPIPE"));

    await expect(pending).rejects.toThrow("write EPIPE");
    await expect(sink.write("b;2")).rejects.toThrow("write EPIPE");
    expect(sink.written).toBe(1);
  });

  it("rejects a write blocked on drain when the stream closes", async () => {
    const stream = new Writable({ highWaterMark: 1, write: () => undefined });
    const sink = createStreamSink(stream);
    const pending = sink.write("a;1");
    await new Promise((r) => setImmediate(r));
    stream.destroy();

    await expect(pending).rejects.toThrow("output stream closed");
  });
});
