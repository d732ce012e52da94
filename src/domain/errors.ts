export type MazeErrorCode =
  | 'invalid_action'
  | 'no_history'
  | 'game_over'
  | 'turn_in_progress'
  | 'invalid_level'
  | 'invalid_session';

export type MazeErrorContext = Readonly<Record<string, unknown>>;

function formatMessage(message: string, context?: MazeErrorContext): string {
  if (context === undefined) {
    return message;
  }

  return `${message} context=${JSON.stringify(context)}`;
}

export class MazeError extends Error {
  readonly code: MazeErrorCode;
  readonly context?: MazeErrorContext;

  constructor(code: MazeErrorCode, message: string, context?: MazeErrorContext) {
    super(formatMessage(message, context));
    this.name = 'MazeError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
  }
}

export function invalidLevelError(message: string, context?: MazeErrorContext): MazeError {
  return new MazeError('invalid_level', message, context);
}

export function isMazeError(value: unknown): value is MazeError {
  return value instanceof MazeError;
}
