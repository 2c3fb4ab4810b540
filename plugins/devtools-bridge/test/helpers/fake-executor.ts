import type { Command } from "../../src/types/command.js";
import type { ExecResult, Executor } from "../../src/execution/executor.js";

export type Responder = (argv: readonly string[]) => Partial<ExecResult> | undefined;

/**
 * Scripted executor. Each call goes to the first responder that returns a result;
 * unmatched commands exit 0 with no output.
 */
export class FakeExecutor implements Executor {
  readonly calls: Command[] = [];
  private readonly responders: Responder[] = [];

  on(responder: Responder): this {
    this.responders.push(responder);
    return this;
  }

  /** Respond to every command whose argv contains `fragment` in some argument. */
  when(fragment: string, result: Partial<ExecResult>): this {
    return this.on((argv) => (argv.some((a) => a.includes(fragment)) ? result : undefined));
  }

  async execute(command: Command): Promise<ExecResult> {
    this.calls.push(command);
    let partial: Partial<ExecResult> = {};
    for (const responder of this.responders) {
      const r = responder(command.argv);
      if (r) {
        partial = r;
        break;
      }
    }
    return { stdout: "", stderr: "", exitCode: 0, timedOut: false, durationMs: 1, ...partial };
  }

  /** Argument vectors of every call, joined with spaces. */
  get commandLines(): string[] {
    return this.calls.map((c) => c.argv.join(" "));
  }
}
