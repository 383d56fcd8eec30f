export interface StageLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createStageLogger(stage: string): StageLogger {
  const tag = `[${stage}]`;
  return {
    info: (message) => console.log(`${tag} ${message}`),
    warn: (message) => console.warn(`${tag} ${message}`),
    error: (message) => console.error(`${tag} ${message}`),
  };
}

export const silentLogger: StageLogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
