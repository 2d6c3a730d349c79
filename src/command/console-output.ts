import { Injectable } from '@nestjs/common';

/**
 * Command output, kept apart from the application log
 */
@Injectable()
export class ConsoleOutput {
  output(text: string): void {
    process.stdout.write(text);
  }

  outputLine(line = ''): void {
    process.stdout.write(`${line}\n`);
  }
}
