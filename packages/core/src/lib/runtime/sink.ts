export type RecordSink = {
  write: (record: string) => Promise<void>;
  readonly written: number;
};

/**
 * Serializes records onto one stream. Each record goes out in a single write,
 * queued behind the previous one, so concurrent producers never interleave.
 * Once `signal` is aborted nothing further is emitted. A stream that errors or
 * closes while a write waits for `drain` rejects that write and every later one.
 */
export function createStreamSink(stream: NodeJS.WritableStream, opts: { signal?: AbortSignal } = {}): RecordSink {
  let written = 0;
  let tail: Promise<void> = Promise.resolve();
  let broken: Error | null = null;

  const waitForDrain = () =>
    new Promise<void>((resolve, reject) => {
      const cleanup = () => {
        stream.removeListener("drain", onDrain);
        stream.removeListener("error", onError);
        stream.removeListener("close", onClose);
      };
      const onDrain = () => {
        cleanup();
        resolve();
      };
      const onError = (err: Error) => {
        cleanup();
        reject(err);
      };
      const onClose = () => {
        cleanup();
        reject(new Error("output stream closed"));
      };
      stream.once("drain", onDrain);
      stream.once("error", onError);
      stream.once("close", onClose);
    });

  const writeOne = async (record: string) => {
    if (opts.signal?.aborted) return;
    if (broken) throw broken;
    if (!stream.writable) {
      broken = new Error("output stream closed");
      throw broken;
    }
    const line = `${record.replace(/[\r\n]+/g, " ")}\n`;
    const flushed = stream.write(line);
    written += 1;
    if (flushed) return;
    try {
      await waitForDrain();
    } catch (err) {
      broken = err instanceof Error ? err : new Error(String(err));
      throw broken;
    }
  };

  return {
    get written() {
      return written;
    },
    write: (record) => {
      const next = tail.then(() => writeOne(record));
      // The caller sees the rejection through `next`; the queue keeps going.
      tail = next.catch(() => undefined);
      return next;
    },
  };
}
