export interface LoggerService {
  app: string;
  error(message: string, stack?: string): void;
  log(message: string): void;
  warn(message: string): void;
  debug(message: string): void;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
