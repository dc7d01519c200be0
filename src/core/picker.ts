import pc from "picocolors";
import {
  createPrompt,
  useState,
  useKeypress,
  usePagination,
  isEnterKey,
  isUpKey,
  isDownKey,
  ExitPromptError,
} from "@inquirer/core";
import { SelectionFlow } from "./selection.js";
import type { ChoicePresenter } from "../types/index.js";

interface PickPromptConfig {
  message: string;
  flow: SelectionFlow;
  indicator: string;
  pageSize: number;
}

function indent(label: string, width: number): string {
  return label.split("\n").join("\n" + " ".repeat(width));
}

const pickPrompt = createPrompt<number | null, PickPromptConfig>((config, done) => {
  const { flow, indicator } = config;
  const [focus, setFocus] = useState(flow.focusIndex);
  const [status, setStatus] = useState<"idle" | "done" | "cancelled">("idle");

  useKeypress((key) => {
    if (isEnterKey(key)) {
      setStatus("done");
      done(flow.confirm());
    } else if (key.name === "q") {
      setStatus("cancelled");
      done(flow.cancel());
    } else if (isUpKey(key) || key.name === "k") {
      setFocus(flow.move(-1));
    } else if (isDownKey(key) || key.name === "j") {
      setFocus(flow.move(1));
    }
  });

  const title = `${pc.green("?")} ${pc.bold(config.message)}`;

  if (status === "done") {
    return `${title} ${pc.cyan(flow.options[focus].split("\n")[0])}`;
  }
  if (status === "cancelled") {
    return `${title} ${pc.dim("cancelled")}`;
  }

  const page = usePagination({
    items: flow.options,
    active: focus,
    pageSize: config.pageSize,
    loop: false,
    renderItem: ({ item, isActive }) => {
      const width = indicator.length + 1;
      const label = indent(item, width);
      return isActive ? pc.cyan(`${indicator} ${label}`) : `${" ".repeat(width)}${label}`;
    },
  });

  return `${title}\n${page}\n${pc.dim("(↑/↓ to move, enter to select, q to quit)")}`;
});

export interface TerminalPickerOptions {
  indicator?: string;
  pageSize?: number;
}

/**
 * Interactive list picker on the terminal
 */
export class TerminalPicker implements ChoicePresenter {
  private readonly indicator: string;
  private readonly pageSize: number;

  constructor(options: TerminalPickerOptions = {}) {
    this.indicator = options.indicator ?? "=>";
    this.pageSize = options.pageSize ?? 20;
  }

  async presentChoice(
    options: readonly string[],
    title: string,
    defaultIndex = 0
  ): Promise<number | null> {
    const flow = new SelectionFlow(options, defaultIndex);
    try {
      return await pickPrompt({
        message: title,
        flow,
        indicator: this.indicator,
        pageSize: this.pageSize,
      });
    } catch (error) {
      // Ctrl+C
      if (error instanceof ExitPromptError) return flow.cancel();
      throw error;
    }
  }
}
