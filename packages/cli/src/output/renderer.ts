import pc from 'picocolors';

/**
 * Routes human-facing messages: stdout normally, stderr under --json so that
 * stdout carries only the JSON document.
 */
export class OutputRenderer {
  constructor(private isJson: boolean) {}

  get json(): boolean {
    return this.isJson;
  }

  log(message: string): void {
    if (this.isJson) {
      console.error(message);
    } else {
      console.log(message);
    }
  }

  warn(message: string): void {
    console.error(pc.yellow(message));
  }

  error(message: string): void {
    console.error(pc.red(message));
  }

  data(value: unknown): void {
    console.log(JSON.stringify(value, null, 2));
  }
}
