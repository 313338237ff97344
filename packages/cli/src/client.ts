import "dotenv/config";
import { loadConfig } from "../../../lib/config";
import type { PipelineDeps } from "../../../lib/chat/pipeline";
import { createOpenRouterGenerator } from "../../../lib/llm/openrouter";
import { createStreamTrace, silentTrace, type TraceSink } from "../../../lib/trace";

export type ClientOptions = {
  model?: string;
  verbose?: boolean;
  /** Replaces the stderr tracer that `verbose` would install. */
  trace?: TraceSink;
};

/** Reads the environment once and wires the pipeline's collaborators. */
export function createClient(options: ClientOptions = {}, env: NodeJS.ProcessEnv = process.env): PipelineDeps {
  const config = loadConfig(env, { model: options.model });
  const trace = options.trace ?? (options.verbose ? createStreamTrace(process.stderr) : silentTrace);
  return {
    config,
    generator: createOpenRouterGenerator(config, trace),
    trace,
  };
}
