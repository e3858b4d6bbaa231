export type Logger = {
  info(message: string): void;
  warn(message: string): void;
};

export const stderrLogger: Logger = {
  info(message) {
    process.stderr.write(`${message}\n`);
  },
  warn(message) {
    process.stderr.write(`warn: ${message}\n`);
  }
};

export const silentLogger: Logger = {
  info() {},
  warn() {}
};
