/** Console-compatible sink for diagnostic messages. */
export type Logger = Pick<Console, 'debug'>;

export const silentLogger: Logger = {
  debug: () => undefined,
};
