/**
 * Minimal interface of the stream progress output goes to; `process.stdout` satisfies it.
 */
export interface ProgressOutput {
  write(chunk: string): unknown;
}

/**
 * Simple progress indicator utility for terminal output
 */
export class ProgressIndicator {
  private currentStep = 0;
  private totalSteps = 0;
  private stepName = '';
  private startTime = Date.now();

  constructor(private readonly disabled: boolean = false, private readonly output: ProgressOutput = process.stdout) {}

  start(totalSteps: number, stepName: string): void {
    if (this.disabled) return;
    this.totalSteps = totalSteps;
    this.currentStep = 0;
    this.stepName = stepName;
    this.startTime = Date.now();
    this.update(0);
  }

  update(current: number, itemName?: string): void {
    if (this.disabled) return;
    this.currentStep = current;
    const percentage = this.totalSteps > 0 ? Math.round((this.currentStep / this.totalSteps) * 100) : 0;

    // Keep the line short enough not to wrap
    const maxItemNameLength = 70;
    let itemDisplay = '';
    if (itemName) {
      const truncated = itemName.length > maxItemNameLength ? itemName.substring(0, maxItemNameLength - 3) + '...' : itemName;
      itemDisplay = ` - ${truncated}`;
    }

    // \r returns to the start of the line, \x1b[K clears what was there
    this.output.write(`\r\x1b[K${this.stepName}: [${this.currentStep}/${this.totalSteps}] ${percentage}%${itemDisplay}`);
  }

  increment(itemName?: string): void {
    if (this.disabled) return;
    this.update(this.currentStep + 1, itemName);
  }

  complete(): void {
    if (this.disabled) return;
    const elapsedSeconds = ((Date.now() - this.startTime) / 1000).toFixed(1);
    this.output.write(`\r\x1b[K${this.stepName}: [${this.totalSteps}/${this.totalSteps}] 100% ✓ (${elapsedSeconds}s)\n`);
  }

  message(text: string): void {
    if (this.disabled) return;
    this.output.write(`\r\x1b[K${text}\n`);
  }

  warn(text: string): void {
    if (this.disabled) return;
    this.output.write(`\r\x1b[K⚠️  ${text}\n`);
  }
}
