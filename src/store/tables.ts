/**
 * Store Module - SQLite Tables
 *
 * Drizzle table definitions. Timestamps are epoch milliseconds.
 */
import { integer, real, sqliteTable, text } from "drizzle-orm/sqlite-core";

import { SeveritySchema } from "../recommendations/schema.js";
import { EventSeveritySchema } from "./schema.js";

const RELAY = ["ON", "OFF"] as const;
const ALARM = ["NOR", "BUZ"] as const;

export const sensorReadings = sqliteTable("sensor_readings", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  recordedAt: integer("recorded_at").notNull(),
  current: real("current"),
  voltage: real("voltage"),
  rpm: real("rpm"),
  ambientTempC: real("ambient_temp_c"),
  humidity: real("humidity"),
  ambientTempF: real("ambient_temp_f"),
  heatIndexC: real("heat_index_c"),
  heatIndexF: real("heat_index_f"),
  relay1: text("relay1", { enum: RELAY }),
  relay2: text("relay2", { enum: RELAY }),
  relay3: text("relay3", { enum: RELAY }),
  alarm: text("alarm", { enum: ALARM }),
  controllerTemp: real("controller_temp"),
  controllerVoltage: real("controller_voltage"),
  sensorConnected: integer("sensor_connected", { mode: "boolean" }).notNull(),
  controllerConnected: integer("controller_connected", { mode: "boolean" }).notNull(),
  overallHealth: real("overall_health"),
  electricalHealth: real("electrical_health"),
  thermalHealth: real("thermal_health"),
  mechanicalHealth: real("mechanical_health"),
  predictiveHealth: real("predictive_health"),
  efficiencyScore: real("efficiency_score"),
  powerKw: real("power_kw").notNull(),
});

export const maintenanceAlerts = sqliteTable("maintenance_alerts", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  createdAt: integer("created_at").notNull(),
  type: text("alert_type").notNull(),
  category: text("category").notNull(),
  severity: text("severity", { enum: SeveritySchema.options }).notNull(),
  priority: text("priority", { enum: SeveritySchema.options }).notNull(),
  description: text("description").notNull(),
  action: text("recommended_action").notNull(),
  confidence: real("confidence").notNull(),
  acknowledged: integer("acknowledged", { mode: "boolean" }).notNull().default(false),
});

export const systemEvents = sqliteTable("system_events", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  createdAt: integer("created_at").notNull(),
  eventType: text("event_type").notNull(),
  component: text("component").notNull(),
  message: text("message").notNull(),
  severity: text("severity", { enum: EventSeveritySchema.options }).notNull(),
});
