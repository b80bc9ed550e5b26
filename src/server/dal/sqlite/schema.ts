export const SCHEMA_VERSION = '2026_10_01_allocation_store';

export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS allocation_runs (
    run_id TEXT PRIMARY KEY,
    started_at_utc TEXT NOT NULL,
    completed_at_utc TEXT,
    status TEXT NOT NULL CHECK (status IN ('ok', 'skipped', 'error')),
    allocation_method TEXT NOT NULL,
    telemetry_count INTEGER NOT NULL DEFAULT 0,
    cost_count INTEGER NOT NULL DEFAULT 0,
    allocated_count INTEGER NOT NULL DEFAULT 0,
    total_cost REAL NOT NULL DEFAULT 0,
    allocated_cost REAL NOT NULL DEFAULT 0,
    conservation_violations INTEGER NOT NULL DEFAULT 0,
    rejected_records INTEGER NOT NULL DEFAULT 0,
    error_message TEXT
  );

  CREATE TABLE IF NOT EXISTS allocated_records (
    partition_path TEXT NOT NULL,
    window_start_utc TEXT NOT NULL,
    resource_id TEXT NOT NULL,
    device_id TEXT NOT NULL,
    store_number TEXT NOT NULL,
    allocated_cost REAL NOT NULL,
    allocation_method TEXT NOT NULL,
    run_id TEXT NOT NULL REFERENCES allocation_runs(run_id),
    record_json TEXT NOT NULL,
    PRIMARY KEY (window_start_utc, resource_id, device_id, store_number)
  );

  CREATE TABLE IF NOT EXISTS raw_telemetry (
    timestamp_utc TEXT NOT NULL,
    device_id TEXT NOT NULL,
    store_number TEXT NOT NULL,
    resource_id TEXT NOT NULL,
    tokens_used REAL NOT NULL,
    status_code INTEGER NOT NULL,
    response_time_ms REAL NOT NULL,
    run_id TEXT NOT NULL REFERENCES allocation_runs(run_id),
    UNIQUE (timestamp_utc, device_id, store_number, resource_id, tokens_used, status_code, response_time_ms)
  );

  CREATE TABLE IF NOT EXISTS raw_costs (
    resource_id TEXT NOT NULL,
    usage_timestamp_utc TEXT NOT NULL,
    meter_name TEXT NOT NULL,
    cost REAL NOT NULL,
    usage_quantity REAL NOT NULL,
    currency TEXT NOT NULL,
    service_name TEXT NOT NULL,
    run_id TEXT NOT NULL REFERENCES allocation_runs(run_id),
    PRIMARY KEY (resource_id, usage_timestamp_utc, meter_name)
  );

  CREATE INDEX IF NOT EXISTS idx_allocated_records_partition ON allocated_records(partition_path);
  CREATE INDEX IF NOT EXISTS idx_allocated_records_device ON allocated_records(device_id, store_number);
  CREATE INDEX IF NOT EXISTS idx_raw_telemetry_timestamp ON raw_telemetry(timestamp_utc);
  CREATE INDEX IF NOT EXISTS idx_raw_costs_timestamp ON raw_costs(usage_timestamp_utc);
  CREATE INDEX IF NOT EXISTS idx_allocation_runs_started ON allocation_runs(started_at_utc DESC);
`;
