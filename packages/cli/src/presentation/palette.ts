import chalk, { Chalk } from 'chalk';

type Paint = (text: string) => string;

export interface Palette {
  connected: Paint;
  disconnected: Paint;
  powerOn: Paint;
  powerOff: Paint;
  error: Paint;
  warn: Paint;
  success: Paint;
  dim: Paint;
  bold: Paint;
}

export function createPalette(color: boolean): Palette {
  const c = new Chalk({ level: color ? chalk.level : 0 });
  return {
    connected: (t) => c.green(t),
    disconnected: (t) => c.red(t),
    powerOn: (t) => c.green(t),
    powerOff: (t) => c.red(t),
    error: (t) => c.red(t),
    warn: (t) => c.yellow(t),
    success: (t) => c.green(t),
    dim: (t) => c.dim(t),
    bold: (t) => c.bold(t),
  };
}
