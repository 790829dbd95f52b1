import { debuglog } from "node:util";
import chalk from "chalk";

const debug = debuglog("platform");

/**
 * Colored terminal output. Debug messages are only printed when the
 * `NODE_DEBUG` environment variable includes `platform`.
 */
export const log = {
  info: (message: string): void => {
    console.log(chalk.blue(message));
  },

  success: (message: string): void => {
    console.log(chalk.green(message));
  },

  warn: (message: string): void => {
    console.warn(chalk.yellow(message));
  },

  error: (message: string): void => {
    console.error(chalk.red(message));
  },

  debug: (message: string): void => {
    debug(message);
  },

  /**
   * Print a message without any decoration (usage text, command output)
   */
  raw: (message: string): void => {
    console.log(message);
  },
};
