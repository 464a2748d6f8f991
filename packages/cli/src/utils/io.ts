import os from 'os';

/**
 * Process boundary of the CLI. Tests substitute an in-memory implementation.
 */
export interface CliIO {
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** Where the user config directory lives */
  homeDir: string;
  stdout(text: string): void;
  stderr(text: string): void;
  readStdin(): Promise<string>;
}

async function readProcessStdin(): Promise<string> {
  if (process.stdin.isTTY) {
    return '';
  }
  process.stdin.setEncoding('utf8');
  let text = '';
  for await (const chunk of process.stdin) {
    text += String(chunk);
  }
  return text;
}

export function processIO(): CliIO {
  return {
    cwd: process.cwd(),
    env: process.env,
    homeDir: os.homedir(),
    stdout: (text) => process.stdout.write(`${text}\n`),
    stderr: (text) => process.stderr.write(text),
    readStdin: readProcessStdin,
  };
}
