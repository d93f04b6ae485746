import type { Key } from "ink";
import { log } from "../services/logger";
import type { CommandContext, InputHandler } from "./types";

/**
 * Routes each key to the highest-priority handler that accepts it
 */
export class InputRegistry {
  private handlers: InputHandler[] = [];

  registerInputHandler(handler: InputHandler): void {
    this.handlers.push(handler);
    this.handlers.sort((a, b) => (b.priority ?? 0) - (a.priority ?? 0));
  }

  handleInput(input: string, key: Key, context: CommandContext): boolean {
    for (const handler of this.handlers) {
      if (!handler.canHandle(context)) continue;
      if (handler.handleInput(input, key, context)) return true;
    }
    if (input) log.debug(`Unhandled key "${input}"`, "input", { mode: context.state.mode });
    return false;
  }
}
