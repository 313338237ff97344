export type TraceSink = (scope: string, message: string) => void;

export const silentTrace: TraceSink = () => undefined;

export function createStreamTrace(stream: { write(chunk: string): unknown }): TraceSink {
  return (scope, message) => {
    stream.write(`[${scope}] ${message}\n`);
  };
}
