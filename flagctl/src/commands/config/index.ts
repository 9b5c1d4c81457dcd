import { Command } from 'commander';
import type { CommandContext } from '../../context';
import { configGetCommand } from './get';
import { configInitCommand } from './init';
import { configListCommand } from './list';
import { configSetCommand } from './set';

export function configCommand(context: CommandContext): Command {
  return new Command('config')
    .description(
      'Manage the flagctl configuration file (~/.flagctl/config.yaml).\n\n' +
        'The file holds a default environment and, per environment, the service\n' +
        'base URL and API key:\n\n' +
        '  default_env: prod\n' +
        '  environments:\n' +
        '    prod:\n' +
        '      base_url: https://flags.example.com\n' +
        '      api_key: <key>\n\n' +
        'Keys are addressed as <env>.<field>, where field is base_url or api_key.'
    )
    .addCommand(configInitCommand(context))
    .addCommand(configListCommand(context))
    .addCommand(configGetCommand(context))
    .addCommand(configSetCommand(context));
}
