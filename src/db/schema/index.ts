import { jsonb, pgTable, timestamp, varchar } from "drizzle-orm/pg-core";
import type { AppState } from "@/lib/types";

// Whole-state snapshot row; collections inside stay independently keyed.
export const appRuntimeState = pgTable("app_runtime_state", {
  id: varchar("id", { length: 64 }).primaryKey(),
  stateJson: jsonb("state_json").$type<AppState>().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull()
});
