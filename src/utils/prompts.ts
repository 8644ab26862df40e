import { confirm } from '@inquirer/prompts';

/**
 * Prompt user to confirm an action
 */
export async function promptConfirm(message: string, defaultValue = true): Promise<boolean> {
  return confirm({
    message,
    default: defaultValue,
  });
}
