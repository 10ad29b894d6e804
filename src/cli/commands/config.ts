import {
  ConfigurationSchema,
  configFilePath,
  isConfigurationKey,
  loadConfiguration,
  resetConfigValue,
  saveConfigValue,
} from '../../core/configuration.js';
import * as ui from '../ui.js';

const validKeys = (): string => Object.keys(ConfigurationSchema.shape).join(', ');

const resolvedValue = (key: string): string => {
  const config = loadConfiguration();
  return isConfigurationKey(key) ? String(config[key]) : '(unknown key)';
};

export function configShow(): number {
  const config = loadConfiguration();

  const lines: string[] = [];
  lines.push(ui.bold('Traversal'));
  lines.push(`  traversal     ${config.traversal}`);
  lines.push(`  stopOnCycle   ${config.stopOnCycle}`);
  lines.push('');
  lines.push(ui.bold('Logging'));
  lines.push(`  logLevel      ${config.logLevel}`);
  lines.push(`  logFormat     ${config.logFormat}`);

  ui.note(lines.join('\n'), 'Configuration (env > config file > defaults)');
  ui.info(`Config file: ${ui.dim(configFilePath())}`);
  return 0;
}

export function configSet(key: string | undefined, value: string | undefined): number {
  if (!key || value === undefined) {
    ui.error('Usage: pathwise config set <key> <value>');
    ui.info(`Valid keys: ${validKeys()}`);
    return 1;
  }

  const result = saveConfigValue(key, value);
  if (!result.ok) {
    ui.error(result.error.message);
    return 1;
  }

  // Show the resolved value after saving (env may still override it)
  ui.success(`${key} = ${resolvedValue(key)}`);
  return 0;
}

export function configReset(key: string | undefined): number {
  if (!key) {
    ui.error('Usage: pathwise config reset <key>');
    ui.info(`Valid keys: ${validKeys()}`);
    return 1;
  }

  const result = resetConfigValue(key);
  if (!result.ok) {
    ui.error(result.error.message);
    return 1;
  }

  ui.success(`${key} reset to default: ${resolvedValue(key)}`);
  return 0;
}

export function configPath(): number {
  ui.stdout(configFilePath());
  return 0;
}
