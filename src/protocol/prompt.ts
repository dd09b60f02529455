import { input } from "@inquirer/prompts";

import type { ProtocolPolicy } from "../core/config.js";
import type { ProtocolMismatch, Transport } from "../core/types.js";
import { redactUrl } from "../core/utils.js";

export type ProtocolChoice = "switch" | "keep";

export interface ProtocolPromptContext {
  mismatches: readonly ProtocolMismatch[];
  desired: Transport;
  /** 1 for the first question, incremented after every unrecognised answer. */
  attempt: number;
  previousAnswer?: string;
}

/**
 * Asks whether mismatched remotes should be rewritten. Resolves with the raw
 * answer, or `null` when the user cancelled.
 */
export type ProtocolPrompt = (context: ProtocolPromptContext) => Promise<string | null>;

const SWITCH_ANSWERS = new Set(["1", "switch", "s", "y", "yes"]);
const KEEP_ANSWERS = new Set(["2", "keep", "k", "n", "no"]);

export function parseProtocolChoice(answer: string): ProtocolChoice | null {
  const normalized = answer.trim().toLowerCase();
  if (SWITCH_ANSWERS.has(normalized)) {
    return "switch";
  }
  if (KEEP_ANSWERS.has(normalized)) {
    return "keep";
  }
  return null;
}

/** A prompt for unattended runs that always gives the same answer. */
export function fixedChoicePrompt(choice: ProtocolChoice): ProtocolPrompt {
  return async () => choice;
}

export interface TerminalPromptOptions {
  signal?: AbortSignal;
  write?: (line: string) => void;
}

export function createTerminalPrompt(options: TerminalPromptOptions = {}): ProtocolPrompt {
  const write = options.write ?? ((line: string) => console.log(line));

  return async (context) => {
    const label = context.desired.toUpperCase();

    if (context.attempt === 1) {
      write("");
      write(`Protocol mismatch detected for ${context.mismatches.length} repositories:`);
      for (const mismatch of context.mismatches) {
        write(`  - ${mismatch.name}: ${redactUrl(mismatch.currentUrl)}`);
      }
      write("");
      write(`  1) Switch all to ${label}`);
      write("  2) Keep current remotes");
    } else {
      write(`"${context.previousAnswer ?? ""}" is not a valid choice. Enter 1 or 2.`);
    }

    try {
      return await input(
        { message: "Choose an option [1/2]:" },
        options.signal ? { signal: options.signal } : undefined,
      );
    } catch (error) {
      if (isPromptCancellation(error)) {
        return null;
      }
      throw error;
    }
  };
}

export function createPromptForPolicy(
  policy: ProtocolPolicy,
  options: TerminalPromptOptions = {},
): ProtocolPrompt {
  if (policy === "switch" || policy === "keep") {
    return fixedChoicePrompt(policy);
  }
  return createTerminalPrompt(options);
}

function isPromptCancellation(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return error.name === "ExitPromptError" || error.name === "AbortPromptError";
}
