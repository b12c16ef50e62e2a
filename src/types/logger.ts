// Subset of Console the services log through; production code passes `console`
export type Logger = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;
