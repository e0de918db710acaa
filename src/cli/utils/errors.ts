import chalk from 'chalk';

import { ChallengeServerError, ManagementApiError } from '../../lib/errors/errors.js';
import { SERVER_ERROR } from '../../lib/errors/codes.js';

/** Central error handler for CLI commands. */
export function handleError(error: unknown): void {
  if (error instanceof ManagementApiError && error.code === SERVER_ERROR.requestFailed) {
    console.error('\n' + chalk.yellow('Management API request failed'));
    console.error(error.message);
    console.error(chalk.gray('Is the server running with its management API enabled?'));
  } else if (error instanceof ChallengeServerError) {
    console.error(chalk.red(`Error [${error.code}]:`), error.message);
  } else if (error instanceof Error) {
    const message = error.message.toLowerCase();
    if (message.includes('econnrefused')) {
      console.error('\n' + chalk.yellow('Connection refused'));
      console.error(error.message);
    } else {
      console.error(chalk.red('Error:'), error.message);
    }
  } else {
    console.error('Unknown error:', error);
  }
}
