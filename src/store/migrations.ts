/**
 * Store Module - SQLite DDL
 *
 * Applied on open. Column names must match tables.ts.
 */

export const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS sensor_readings (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    recorded_at INTEGER NOT NULL,
    current REAL,
    voltage REAL,
    rpm REAL,
    ambient_temp_c REAL,
    humidity REAL,
    ambient_temp_f REAL,
    heat_index_c REAL,
    heat_index_f REAL,
    relay1 TEXT,
    relay2 TEXT,
    relay3 TEXT,
    alarm TEXT,
    controller_temp REAL,
    controller_voltage REAL,
    sensor_connected INTEGER NOT NULL,
    controller_connected INTEGER NOT NULL,
    overall_health REAL,
    electrical_health REAL,
    thermal_health REAL,
    mechanical_health REAL,
    predictive_health REAL,
    efficiency_score REAL,
    power_kw REAL NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_sensor_readings_recorded_at
    ON sensor_readings (recorded_at)`,
  `CREATE TABLE IF NOT EXISTS maintenance_alerts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    created_at INTEGER NOT NULL,
    alert_type TEXT NOT NULL,
    category TEXT NOT NULL,
    severity TEXT NOT NULL,
    priority TEXT NOT NULL,
    description TEXT NOT NULL,
    recommended_action TEXT NOT NULL,
    confidence REAL NOT NULL,
    acknowledged INTEGER NOT NULL DEFAULT 0
  )`,
  `CREATE INDEX IF NOT EXISTS idx_maintenance_alerts_open
    ON maintenance_alerts (alert_type, acknowledged, created_at)`,
  `CREATE TABLE IF NOT EXISTS system_events (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    created_at INTEGER NOT NULL,
    event_type TEXT NOT NULL,
    component TEXT NOT NULL,
    message TEXT NOT NULL,
    severity TEXT NOT NULL
  )`,
];
