#!/usr/bin/env node
import { Option, program } from 'commander';
import inquirer from 'inquirer';
import { runSetup } from './services/setup';
import { configService } from './services/config';
import { scribeCommand } from './commands/scribe';
import { noteCommand } from './commands/note';
import { parseFormatOption } from './utils/formats';

type MenuAction = 'scribe' | 'note' | 'settings' | 'exit';

interface CliOptions {
  format?: string;
  speakerLabels?: boolean;
  out?: string;
}

const formatOption = () =>
  new Option('-f, --format <format>', 'note format: SOAP or HP (asks when omitted)')
    .argParser((value: string) => {
      if (!parseFormatOption(value)) {
        console.error(`❌ Unknown format "${value}". Use SOAP or HP.`);
        process.exit(1);
      }
      return value;
    });

program
  .name('scribe-cli')
  .description('CLI to transcribe clinical encounters into SOAP or H&P notes')
  .version('1.0.0');

/**
 * Ensures the app is configured before proceeding.
 * If not, triggers the setup wizard.
 */
async function ensureConfig(): Promise<void> {
  if (!configService.hasConfigured()) {
    console.log('⚠️ Configuration missing. Starting setup wizard...');
    await runSetup();
    console.log('\n✅ Setup complete!');
  }
}

/**
 * The main interactive loop of the application.
 */
async function mainMenuLoop() {
  // eslint-disable-next-line no-constant-condition
  while (true) {
    console.log(''); // Visual spacing

    const { action } = await inquirer.prompt<{ action: MenuAction }>([
      {
        type: 'list',
        name: 'action',
        message: 'What would you like to do?',
        choices: [
          { name: 'Transcribe a Visit 🩺', value: 'scribe' },
          { name: 'Note from Transcript 📝', value: 'note' },
          { name: 'Settings ⚙️', value: 'settings' },
          { name: 'Exit 🚪', value: 'exit' }
        ]
      }
    ]);

    if (action === 'exit') {
      console.log('Goodbye! 👋');
      process.exit(0);
    }

    try {
      switch (action) {
        case 'scribe':
          await scribeCommand();
          break;
        case 'note': {
          const { file } = await inquirer.prompt<{ file: string }>([{
            type: 'input',
            name: 'file',
            message: 'Transcript file (.txt):',
            validate: (input: string) => input.trim() !== '' || 'A file is required'
          }]);
          await noteCommand(file.trim());
          break;
        }
        case 'settings':
          await runSetup();
          break;
      }
    } catch (error) {
      console.error('❌ An unexpected error occurred:', error);
    }
  }
}

/**
 * Entry point for the default 'start' command.
 */
async function startApp() {
  console.clear();
  console.log('=== Clinical Scribe CLI ===');

  await ensureConfig();
  await mainMenuLoop();
}

// --- CLI Command Definitions ---

program
  .command('start', { isDefault: true })
  .description('Start the interactive main menu')
  .action(startApp);

program
  .command('transcribe')
  .description('Transcribe an audio file or URL and export the note')
  .argument('[source]', 'local audio file or https:// URL (asks when omitted)')
  .addOption(formatOption())
  .option('--no-speaker-labels', 'do not separate speakers')
  .option('-o, --out <dir>', 'directory for the exported note (defaults to the configured output)')
  .action(async (source: string | undefined, options: CliOptions) => {
    await ensureConfig();
    const ok = await scribeCommand(source, {
      format: parseFormatOption(options.format),
      // commander defaults the flag to true; only an explicit --no-speaker-labels is kept
      speakerLabels: options.speakerLabels === false ? false : undefined,
      out: options.out
    });
    process.exitCode = ok ? 0 : 1;
  });

program
  .command('note')
  .description('Generate a note from an existing transcript file')
  .argument('<transcriptFile>', 'plain-text transcript')
  .addOption(formatOption())
  .option('-o, --out <dir>', 'directory for the exported note (defaults to the configured output)')
  .action(async (transcriptFile: string, options: CliOptions) => {
    await ensureConfig();
    const ok = await noteCommand(transcriptFile, {
      format: parseFormatOption(options.format),
      out: options.out
    });
    process.exitCode = ok ? 0 : 1;
  });

program
  .command('settings')
  .description('Run setup wizard')
  .action(runSetup);

program.parseAsync().catch((error: unknown) => {
  console.error('❌ An unexpected error occurred:', error);
  process.exit(1);
});
