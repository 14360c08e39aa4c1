import { execa as baseExeca } from "execa";
import type { Options } from "execa";

// CI=1 selects JSONL output and skips the start prompt.
export const execa = (command: string, args: string[], options: Options = {}) => {
  return baseExeca(command, args, {
    reject: false,
    timeout: 15000,
    ...options,
    env: {
      CI: "1",
      ...options.env,
    },
  });
};
