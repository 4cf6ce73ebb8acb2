/**
 * `chatdeck setup`: interactive first-run wizard.
 */

import { Command } from "commander";
import { loadCliContext } from "../context.js";
import { reportError } from "../output.js";
import { InteractiveSession, isPromptExit } from "../session.js";
import { runSetupWizard } from "../wizard.js";

export function createSetupCommand(): Command {
  return new Command("setup").description("Create an agent interactively").action(async () => {
    try {
      const context = loadCliContext();
      const { profile, startChat } = await runSetupWizard(context);
      if (startChat) {
        await new InteractiveSession(context, profile).run();
      }
    } catch (error: unknown) {
      if (isPromptExit(error)) {
        return;
      }
      reportError(error, "setup");
    }
  });
}
