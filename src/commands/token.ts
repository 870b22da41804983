// commands/token.ts

import { defineCommand } from "citty";

import { formatArgs, runTool } from "./shared.ts";

export interface TokenStatus {
  environment: string;
  baseUrl: string;
  tokenFile: string;
  token: string;
}

export function maskToken(token: string): string {
  return token.length > 8 ? `${token.slice(0, 8)}...` : "***";
}

export const tokenCommand = defineCommand({
  meta: { name: "token", description: "Fetch (or reuse) an access token and show where it is cached" },
  args: {
    clear: { type: "boolean", description: "Drop the cached token first", default: false },
    ...formatArgs,
  },
  async run({ args }) {
    await runTool(
      args.format,
      async ({ config, tokens }): Promise<TokenStatus> => {
        if (args.clear) await tokens.invalidate();
        const token = await tokens.getAccessToken();
        return {
          environment: config.environment,
          baseUrl: config.baseUrl,
          tokenFile: config.tokenFile,
          token: maskToken(token),
        };
      },
      (s) => [`🔑 Token OK (${s.environment})`, `   API: ${s.baseUrl}`, `   Cache: ${s.tokenFile}`, `   Token: ${s.token}`].join("\n"),
    );
  },
});
