/**
 * Scripted provider calls for testing @relaykit/dispatcher consumers.
 *
 * Each provider id gets a script of outcomes consumed in order; a single
 * (non-array) outcome repeats forever. Tracks every call for assertions.
 */

export interface MockCallResult {
  readonly content: string;
  readonly inputTokens: number;
  readonly outputTokens: number;
}

export interface MockProviderSpec {
  readonly provider: string;
  readonly model: string;
}

/** A result, an error to throw, or a function producing the outcome */
export type ScriptEntry =
  | MockCallResult
  | Error
  | ((signal: AbortSignal) => Promise<MockCallResult>);

export type ProviderScript = ScriptEntry | readonly ScriptEntry[];

export interface RecordedCall {
  readonly spec: MockProviderSpec;
  readonly prepared: unknown;
}

function isScriptList(script: ProviderScript): script is readonly ScriptEntry[] {
  return Array.isArray(script);
}

export class ScriptedProviderCall {
  private readonly scripts: Map<string, ProviderScript>;
  private readonly positions: Map<string, number>;
  readonly calls: RecordedCall[] = [];

  constructor(scripts: Readonly<Record<string, ProviderScript>> = {}) {
    this.scripts = new Map(Object.entries(scripts));
    this.positions = new Map();
  }

  /** Replace one provider's script and rewind it. */
  script(provider: string, script: ProviderScript): void {
    this.scripts.set(provider, script);
    this.positions.delete(provider);
  }

  /**
   * The call function to hand to the dispatcher.
   */
  readonly call = async (
    spec: MockProviderSpec,
    prepared: unknown,
    signal: AbortSignal,
  ): Promise<MockCallResult> => {
    if (signal.aborted) {
      throw signal.reason ?? new DOMException("Aborted", "AbortError");
    }

    this.calls.push({ spec, prepared });
    const entry = this.next(spec.provider);

    if (entry === undefined) {
      throw new Error(
        `ScriptedProviderCall "${spec.provider}": no outcome configured for call #${this.callCount(spec.provider)}`,
      );
    }
    if (entry instanceof Error) throw entry;
    if (typeof entry === "function") return entry(signal);
    return entry;
  };

  /** Calls made to one provider, or to all providers. */
  callCount(provider?: string): number {
    if (provider === undefined) return this.calls.length;
    return this.calls.filter((c) => c.spec.provider === provider).length;
  }

  /** Provider ids in call order. */
  get callOrder(): readonly string[] {
    return this.calls.map((c) => c.spec.provider);
  }

  get lastCall(): RecordedCall | undefined {
    return this.calls[this.calls.length - 1];
  }

  reset(): void {
    this.calls.length = 0;
    this.positions.clear();
  }

  private next(provider: string): ScriptEntry | undefined {
    const script = this.scripts.get(provider);
    if (script === undefined) return undefined;
    if (!isScriptList(script)) return script;

    const position = this.positions.get(provider) ?? 0;
    this.positions.set(provider, position + 1);
    return script[position];
  }
}

/**
 * Helper to create a standard successful call result.
 */
export function createMockResult(overrides?: Partial<MockCallResult>): MockCallResult {
  return {
    content: "Hello, world!",
    inputTokens: 10,
    outputTokens: 20,
    ...overrides,
  };
}

/**
 * An outcome that never settles on its own; it rejects with the signal's
 * reason once aborted.
 */
export function hangingCall(): (signal: AbortSignal) => Promise<MockCallResult> {
  return (signal) =>
    new Promise<MockCallResult>((_resolve, reject) => {
      signal.addEventListener(
        "abort",
        () => {
          reject(signal.reason);
        },
        { once: true },
      );
    });
}
