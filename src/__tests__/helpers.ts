import { ToolkitError } from '../runner/index.js';

export interface MemoryOutput {
  chunks: string[];
  write(chunk: string): boolean;
  text(): string;
}

export function memoryOutput(): MemoryOutput {
  const chunks: string[] = [];
  return {
    chunks,
    write(chunk: string): boolean {
      chunks.push(chunk);
      return true;
    },
    text: () => chunks.join(''),
  };
}

export function envOf(vars: Record<string, string>): (key: string) => string {
  return (key) => vars[key] ?? '';
}

export function captureToolkitError(fn: () => unknown): ToolkitError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ToolkitError) return err;
    throw err;
  }
  throw new Error('expected function to throw');
}

export async function captureToolkitErrorAsync(fn: () => Promise<unknown>): Promise<ToolkitError> {
  try {
    await fn();
  } catch (err) {
    if (err instanceof ToolkitError) return err;
    throw err;
  }
  throw new Error('expected promise to reject');
}
