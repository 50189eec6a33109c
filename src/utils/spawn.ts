import type { SpawnOptions } from 'child_process';
import { spawn } from 'child_process';

/**
 * Result of a spawn operation
 */
export interface SpawnResult {
    stdout: string;
    stderr: string;
    code: number;
}

/**
 * Execute a command asynchronously and collect its output
 *
 * Passing `signal` in options kills the child when the signal aborts;
 * the returned promise then rejects with an AbortError.
 *
 * @example
 * ```typescript
 * const result = await spawnAsync('pdftoppm', ['-v']);
 * console.log(result.stderr); // "pdftoppm version 24.02.0"
 * ```
 */
export function spawnAsync(
    command: string,
    args: string[],
    options: SpawnOptions = {}
): Promise<SpawnResult> {
    return new Promise((resolve, reject) => {
        const proc = spawn(command, args, options);

        let stdout = '';
        let stderr = '';

        proc.stdout?.on('data', (data: Buffer) => {
            stdout += data.toString();
        });

        proc.stderr?.on('data', (data: Buffer) => {
            stderr += data.toString();
        });

        proc.on('close', (code) => {
            resolve({ stdout, stderr, code: code ?? 0 });
        });

        proc.on('error', reject);
    });
}
