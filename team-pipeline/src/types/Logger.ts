/** Where library modules send progress lines; the CLI passes `console`. */
export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;
