import chalk from 'chalk';
import ora, { type Ora } from 'ora';

let activeSpinner: Ora | null = null;

function stopSpinner(): void {
  if (activeSpinner) {
    activeSpinner.stop();
    activeSpinner = null;
  }
}

export const ui = {
  showWelcome(engine: string, version: string, demo: boolean): void {
    console.log('');
    console.log(chalk.cyan.bold(`  Appliance Engine v${version}`));
    console.log(chalk.dim(`  ${engine} engine${demo ? ' | demo mode' : ''}`));
    console.log(chalk.dim('  ─'.repeat(30)));
    console.log('');
  },

  startSpinner(text: string): void {
    stopSpinner();
    activeSpinner = ora({ text, color: 'cyan' }).start();
  },

  showListening(url: string, healthUrl: string): void {
    if (activeSpinner) {
      activeSpinner.succeed(chalk.green(`Listening on ${url}`));
      activeSpinner = null;
    } else {
      console.log(chalk.green(`  Listening on ${url}`));
    }
    console.log(chalk.dim(`  Health: ${healthUrl}`));
    console.log('');
  },

  showWarning(message: string): void {
    stopSpinner();
    console.log(chalk.yellow(`  ${message}`));
  },

  showError(message: string): void {
    if (activeSpinner) {
      activeSpinner.fail(chalk.red(message));
      activeSpinner = null;
      return;
    }
    console.error(chalk.red(`  Error: ${message}`));
  },

  showShutdown(signal: string): void {
    stopSpinner();
    console.log(chalk.dim(`\n  Received ${signal}, shutting down...`));
  },
};
