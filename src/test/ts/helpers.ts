import { KestrelError } from "../../main/ts/common/errors.js";
import { KestrelConfig } from "../../main/ts/config/config.js";
import { MemoryModuleHost } from "../../main/ts/modules/host.js";
import { display } from "../../main/ts/runtime/values.js";
import { Session, SessionOptions } from "../../main/ts/session.js";

export interface TestSession {
  session: Session;
  host: MemoryModuleHost;
  output: string[];
}

/** A session over in-memory files rooted at `/project`, with `print` captured. */
export function createTestSession(
  files: Record<string, string> = {},
  config: Partial<KestrelConfig> = {},
  options: Omit<SessionOptions, "config" | "host" | "print"> = {}
): TestSession {
  const host = new MemoryModuleHost(files, "/project");
  const output: string[] = [];
  const session = new Session({
    ...options,
    config,
    host,
    print: (line) => output.push(line),
  });
  return { session, host, output };
}

/** Runs `source` and returns the displayed value of its last expression. */
export function evalKestrel(source: string, config: Partial<KestrelConfig> = {}): string {
  return display(createTestSession({}, config).session.run(source));
}

export function printed(source: string): string[] {
  const { session, output } = createTestSession();
  session.run(source);
  return output;
}

export function errorOf(fn: () => unknown): KestrelError {
  try {
    fn();
  } catch (e) {
    if (e instanceof KestrelError) return e;
    throw e;
  }
  throw new Error("expected a KestrelError");
}
