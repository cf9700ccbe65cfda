import inquirer from 'inquirer';
import { configService } from './config';
import { apiService } from './api';

interface SetupAnswers {
  serverIp: string;
  serverPort: number;
  apiKey: string;
  outputPath: string;
}

export async function runSetup() {
  console.log('Welcome to Clinical Scribe Setup');

  const currentServer = configService.get('server');
  const currentPaths = configService.get('paths');

  const answers = await inquirer.prompt<SetupAnswers>([
    // --- SERVER CONFIG ---
    {
      type: 'input',
      name: 'serverIp',
      message: 'Server IP (LAN IP of the backend):',
      default: currentServer.ip,
      filter: (input: string) => input.trim()
    },
    {
      type: 'number',
      name: 'serverPort',
      message: 'Server Port:',
      default: currentServer.port,
      validate: (input: number) => (Number.isInteger(input) && input > 0 && input < 65536) || 'Please enter a valid port'
    },
    {
      type: 'password',
      name: 'apiKey',
      message: 'Server API key (leave empty if the server has none):',
      default: currentServer.apiKey
    },

    // --- PATHS CONFIG ---
    {
      type: 'input',
      name: 'outputPath',
      message: 'Output directory for notes:',
      default: currentPaths.output,
      filter: (input: string) => input.trim(),
      validate: (input: string) => input !== '' || 'Output directory is required'
    }
  ]);

  configService.set('server', {
    ip: answers.serverIp,
    port: answers.serverPort,
    apiKey: answers.apiKey
  });
  configService.setOutputPath(answers.outputPath);
  configService.set('setupComplete', true);

  // New address or key: drop the cached HTTP client
  apiService.resetClient();

  console.log('✅ Configuration saved successfully!');
  console.log('Config file location:', configService.path);
}
