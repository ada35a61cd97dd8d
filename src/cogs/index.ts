import type { Cog } from "../commands/types.js";
import { adminCog } from "./admin.js";
import { demoCog } from "./demo.js";
import { eventsCog } from "./events.js";
import { helpCog } from "./help.js";
import { pingCog } from "./ping.js";
import { serverLogsCog } from "./server-logs.js";
import { welcomeCog } from "./welcome.js";

/** Core cogs first, then command cogs; load order is registration order. */
export function defaultCogs(): Cog[] {
  return [eventsCog, welcomeCog, serverLogsCog(), helpCog, pingCog, demoCog, adminCog];
}
