/**
 * The part of a writable stream the text destinations use.
 * `process.stdout` and `process.stderr` satisfy it.
 */
export interface LineStream {
  readonly isTTY?: boolean;
  write(chunk: string, callback: (error?: Error | null) => void): boolean;
}

/**
 * Write one line and wait until the stream has accepted it.
 */
export function writeLine(stream: LineStream, line: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    stream.write(`${line}\n`, (error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}
