import { confirm } from "@inquirer/prompts";

export type Confirm = (message: string) => Promise<boolean>;

export const promptConfirm: Confirm = (message) => confirm({ message, default: false });

/**
 * Ask before building output.
 * Skips the prompt if --yes or -y flag is passed.
 */
export async function confirmProceed(
  options: { yes?: boolean },
  message: string,
  ask: Confirm = promptConfirm
): Promise<boolean> {
  if (options.yes) {
    return true;
  }
  return ask(message);
}
