// cli.ts

import { defineCommand, runMain } from "citty";

import { experienceCommands } from "./commands/experiences.ts";
import { flightCommands } from "./commands/flights.ts";
import { tokenCommand } from "./commands/token.ts";
import { transferCommands } from "./commands/transfers.ts";

export const main = defineCommand({
  meta: {
    name: "amadeus",
    version: "0.1.0",
    description: "Flight search, price comparison and travel lookups on the Amadeus self-service APIs",
  },
  subCommands: {
    ...flightCommands,
    ...experienceCommands,
    ...transferCommands,
    token: tokenCommand,
  },
});

runMain(main).catch((e: unknown) => {
  console.error(e);
  process.exit(1);
});
