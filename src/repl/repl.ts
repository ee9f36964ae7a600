import * as readline from 'readline';
import { Tern } from '../tern';
import { TernError } from '../common/errors';

export const PROMPT = '>> ';

/**
 * Reads one program per line, runs it in a fresh VM and writes the result.
 * Resolves when the input ends.
 */
export function start(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
  tern: Tern = new Tern()
): Promise<void> {
  const rl = readline.createInterface({ input, output, prompt: PROMPT, terminal: false });

  return new Promise((resolve, reject) => {
    rl.on('line', (line) => {
      if (line.trim() !== '') {
        try {
          output.write(`${tern.run(line).inspect()}\n`);
        } catch (error) {
          if (!(error instanceof TernError)) {
            rl.close();
            reject(error);
            return;
          }
          output.write(`${error.name}: ${error.message}\n`);
        }
      }
      rl.prompt();
    });
    rl.on('close', () => resolve());
    rl.prompt();
  });
}
