/**
 * Human operator's console. Accepts literal text: the line is written, then submitted.
 * Delivering the same line twice only duplicates the display.
 */
export interface IOperatorConsole {
  deliver(line: string): Promise<void>;
}
