import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';

/** Stand-in for a spawned process: scripted stdio and exit */
export class FakeChild extends EventEmitter {
  readonly pid = 4242;
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  stdinText = '';

  constructor() {
    super();
    this.stdin.on('data', (chunk: Buffer) => {
      this.stdinText += chunk.toString();
    });
  }

  /** Write output on the next turn, then exit with `code` */
  finish(output: { stdout?: string; stderr?: string; code?: number | null }): void {
    setImmediate(() => {
      if (output.stdout) this.stdout.write(output.stdout);
      if (output.stderr) this.stderr.write(output.stderr);
      setImmediate(() => this.emit('close', output.code === undefined ? 0 : output.code));
    });
  }

  fail(error: Error): void {
    setImmediate(() => this.emit('error', error));
  }
}
