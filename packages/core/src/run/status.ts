export type ExitCode = 0 | 1;

/**
 * Run-wide success flag. It starts at success and, once failed, stays failed.
 */
export class ExitStatus {
  private value: ExitCode = 0;

  fail(): void {
    this.value = 1;
  }

  get failed(): boolean {
    return this.value === 1;
  }

  get code(): ExitCode {
    return this.value;
  }
}
