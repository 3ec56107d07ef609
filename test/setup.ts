// Must run before anything imports Nest: drops "[Nest] ..." log lines so test output stays readable
const ANSI_ESCAPE = new RegExp(String.raw`${String.fromCodePoint(27)}\[[0-9;]*m`, "g");

type WriteCallback = (error?: Error | null) => void;

const isNestLogLine = (chunk: string | Uint8Array): boolean => {
  const text = typeof chunk === "string" ? chunk : Buffer.from(chunk).toString("utf8");
  return text.replaceAll(ANSI_ESCAPE, "").includes("[Nest]");
};

function silenceNestLogs(stream: NodeJS.WriteStream): void {
  const write = stream.write.bind(stream);

  stream.write = (
    chunk: string | Uint8Array,
    encodingOrCallback?: BufferEncoding | WriteCallback,
    callback?: WriteCallback,
  ): boolean => {
    if (isNestLogLine(chunk)) {
      const done = typeof encodingOrCallback === "function" ? encodingOrCallback : callback;
      done?.();
      return true;
    }

    return typeof encodingOrCallback === "function"
      ? write(chunk, encodingOrCallback)
      : write(chunk, encodingOrCallback, callback);
  };
}

silenceNestLogs(process.stdout);
silenceNestLogs(process.stderr);

import "reflect-metadata";
