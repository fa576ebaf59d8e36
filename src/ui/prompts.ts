import { confirm, input } from '@inquirer/prompts';

export async function askConfirm(message: string, defaultValue = true): Promise<boolean> {
  return confirm({ message, default: defaultValue });
}

export async function askInput(message: string, defaultValue?: string): Promise<string> {
  return input({ message, default: defaultValue });
}
