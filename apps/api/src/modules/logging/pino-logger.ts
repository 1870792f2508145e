import fs from "node:fs";
import path from "node:path";

import pino from "pino";

export const LOGGER = Symbol("LOGGER");

export type LoggerOptions = {
  level: string;
  logDir: string;
};

function ensureDir(dirPath: string): void {
  fs.mkdirSync(dirPath, { recursive: true });
}

export function createLogger(options: LoggerOptions): pino.Logger {
  ensureDir(options.logDir);

  const destination = pino.destination({
    dest: path.join(options.logDir, "api.log"),
    sync: false
  });

  return pino(
    {
      level: options.level,
      base: undefined
    },
    pino.multistream([{ stream: process.stdout }, { stream: destination }])
  );
}
