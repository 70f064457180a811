/**
 * In-memory spend recorder for tests.
 */

export interface SpendEntry {
  readonly callerId: string;
  readonly provider: string;
  readonly model: string;
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly description: string;
}

export class InMemorySpendLedger {
  readonly entries: SpendEntry[] = [];
  private failure: Error | undefined;

  /** Make every later `record` call reject with `error`. */
  failWith(error: Error | undefined): void {
    this.failure = error;
  }

  /**
   * The record function to hand to the dispatcher.
   */
  readonly record = async (
    callerId: string,
    spec: { readonly provider: string; readonly model: string },
    inputTokens: number,
    outputTokens: number,
    description: string,
  ): Promise<void> => {
    if (this.failure) throw this.failure;
    this.entries.push({
      callerId,
      provider: spec.provider,
      model: spec.model,
      inputTokens,
      outputTokens,
      description,
    });
  };

  totalTokens(callerId?: string): number {
    return this.entries
      .filter((e) => callerId === undefined || e.callerId === callerId)
      .reduce((sum, e) => sum + e.inputTokens + e.outputTokens, 0);
  }

  reset(): void {
    this.entries.length = 0;
    this.failure = undefined;
  }
}
