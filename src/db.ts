import Database from "better-sqlite3";
import { homedir } from "node:os";
import { mkdirSync, existsSync, readFileSync, writeFileSync, rmSync } from "node:fs";
import { join, dirname } from "node:path";
import { z } from "zod";
import { NUTRIENT_COLUMNS, NUTRIENT_FIELDS } from "./db/nutrient-fields.js";

export type DB = Database.Database;

const APP_DIR_NAME = "nutrigraph";
const DB_FILE_NAME = "nutrigraph.db";

export const DEFAULT_WEIGHT_LBS = 150;

export const unitFallbackSchema = z.enum(["error", "best-effort"]);
export type UnitFallback = z.infer<typeof unitFallbackSchema>;

const configFileSchema = z.object({
  dataDir: z.string().min(1).optional(),
  dbPath: z.string().min(1).optional(),
  unitFallback: unitFallbackSchema.optional(),
  defaultWeightLbs: z.number().positive().optional(),
});

export interface Config {
  dataDir: string;
  dbPath: string;
  unitFallback: UnitFallback;
  defaultWeightLbs: number;
}

interface InitResult {
  initialized: boolean;
  dataDir: string;
  dbPath: string;
  dbCreated: boolean;
  schemaVersion: number;
}

function getDefaultConfigDir(): string {
  if (process.platform === "win32") {
    return join(process.env.APPDATA || join(homedir(), "AppData", "Roaming"), APP_DIR_NAME);
  }
  return join(process.env.XDG_CONFIG_HOME || join(homedir(), ".config"), APP_DIR_NAME);
}

function getDefaultDataDir(): string {
  if (process.platform === "win32") {
    return join(process.env.LOCALAPPDATA || join(homedir(), "AppData", "Local"), APP_DIR_NAME);
  }
  return join(process.env.XDG_DATA_HOME || join(homedir(), ".local", "share"), APP_DIR_NAME);
}

function configDir(): string {
  return process.env.NUTRIGRAPH_CONFIG_DIR || getDefaultConfigDir();
}

function dataDir(): string {
  return process.env.NUTRIGRAPH_DATA_DIR || getDefaultDataDir();
}

function configFile(): string {
  return join(configDir(), "config.json");
}

function ensureDir(path: string): void {
  if (!existsSync(path)) {
    mkdirSync(path, { recursive: true });
  }
}

function readConfigFile(path: string): z.infer<typeof configFileSchema> {
  if (!existsSync(path)) return {};
  try {
    const parsed = configFileSchema.safeParse(JSON.parse(readFileSync(path, "utf-8")));
    if (parsed.success) return parsed.data;
    console.error(`Ignoring invalid config at ${path}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  } catch (e) {
    console.error(`Ignoring unreadable config at ${path}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return {};
}

export function loadConfig(): Config {
  ensureDir(configDir());

  const file = readConfigFile(configFile());
  const dir = file.dataDir || dataDir();
  return {
    dataDir: dir,
    dbPath: file.dbPath || join(dir, DB_FILE_NAME),
    unitFallback: file.unitFallback ?? "error",
    defaultWeightLbs: file.defaultWeightLbs ?? DEFAULT_WEIGHT_LBS,
  };
}

export function saveConfig(update: Partial<Config>): Config {
  const updated = { ...loadConfig(), ...update };

  ensureDir(dirname(configFile()));
  writeFileSync(configFile(), JSON.stringify(updated, null, 2));
  config = updated;
  return updated;
}

export function getConfigPaths(): { configDir: string; dataDir: string; configFile: string } {
  return { configDir: configDir(), dataDir: dataDir(), configFile: configFile() };
}

export function resetConfig(): void {
  if (existsSync(configFile())) {
    rmSync(configFile());
  }
  config = null;
}

let db: DB | null = null;
let config: Config | null = null;

export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

export function setDataDir(path: string): Config {
  const updated = saveConfig({ dataDir: path, dbPath: join(path, DB_FILE_NAME) });
  closeDb();
  return updated;
}

// ---- Schema ----

function nutrientColumns(prefix: string): string {
  return NUTRIENT_FIELDS.map((f) => `${prefix}${NUTRIENT_COLUMNS[f]} REAL NOT NULL DEFAULT 0`).join(",\n      ");
}

interface Migration {
  version: number;
  name: string;
  sql: string;
}

const MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: "nutrition_graph",
    sql: `
    CREATE TABLE food_items (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL,
      brand TEXT,
      serving_size REAL NOT NULL CHECK (serving_size > 0),
      serving_unit TEXT NOT NULL,
      unit_spec TEXT NOT NULL,
      base_unit_type TEXT NOT NULL,
      grams_per_serving REAL,
      ml_per_serving REAL,
      ${nutrientColumns("")},
      preference TEXT NOT NULL DEFAULT 'neutral',
      notes TEXT,
      created_at TEXT NOT NULL DEFAULT (datetime('now')),
      updated_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE TABLE recipes (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL,
      servings_produced REAL NOT NULL CHECK (servings_produced > 0),
      is_favorite INTEGER NOT NULL DEFAULT 0,
      notes TEXT,
      ${nutrientColumns("cached_")},
      created_at TEXT NOT NULL DEFAULT (datetime('now')),
      updated_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE TABLE recipe_ingredients (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      recipe_id INTEGER NOT NULL REFERENCES recipes(id) ON DELETE CASCADE,
      food_item_id INTEGER NOT NULL REFERENCES food_items(id),
      quantity REAL NOT NULL CHECK (quantity > 0),
      unit TEXT NOT NULL,
      unit_spec TEXT NOT NULL,
      notes TEXT,
      created_at TEXT NOT NULL DEFAULT (datetime('now')),
      UNIQUE (recipe_id, food_item_id)
    );

    CREATE TABLE recipe_components (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      recipe_id INTEGER NOT NULL REFERENCES recipes(id) ON DELETE CASCADE,
      component_recipe_id INTEGER NOT NULL REFERENCES recipes(id),
      servings REAL NOT NULL CHECK (servings > 0),
      notes TEXT,
      created_at TEXT NOT NULL DEFAULT (datetime('now')),
      UNIQUE (recipe_id, component_recipe_id),
      CHECK (recipe_id != component_recipe_id)
    );

    CREATE TABLE days (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      date TEXT NOT NULL UNIQUE,
      notes TEXT,
      ${nutrientColumns("cached_")},
      cached_calories_burned REAL NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL DEFAULT (datetime('now')),
      updated_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE TABLE meal_entries (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      day_id INTEGER NOT NULL REFERENCES days(id) ON DELETE CASCADE,
      meal_type TEXT NOT NULL DEFAULT 'unspecified',
      recipe_id INTEGER REFERENCES recipes(id),
      food_item_id INTEGER REFERENCES food_items(id),
      servings REAL NOT NULL CHECK (servings > 0),
      percent_eaten REAL NOT NULL DEFAULT 100 CHECK (percent_eaten >= 0 AND percent_eaten <= 100),
      quantity REAL,
      unit TEXT,
      unit_spec TEXT,
      ${nutrientColumns("cached_")},
      notes TEXT,
      created_at TEXT NOT NULL DEFAULT (datetime('now')),
      updated_at TEXT NOT NULL DEFAULT (datetime('now')),
      CHECK ((recipe_id IS NULL) != (food_item_id IS NULL))
    );

    CREATE INDEX idx_recipe_ingredients_food ON recipe_ingredients(food_item_id);
    CREATE INDEX idx_recipe_components_component ON recipe_components(component_recipe_id);
    CREATE INDEX idx_meal_entries_day ON meal_entries(day_id);
    CREATE INDEX idx_meal_entries_recipe ON meal_entries(recipe_id);
    CREATE INDEX idx_meal_entries_food ON meal_entries(food_item_id);
    `,
  },
  {
    version: 2,
    name: "exercise",
    sql: `
    CREATE TABLE exercises (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      day_id INTEGER NOT NULL REFERENCES days(id) ON DELETE CASCADE,
      exercise_type TEXT NOT NULL,
      notes TEXT,
      cached_duration_minutes REAL NOT NULL DEFAULT 0,
      cached_distance_miles REAL NOT NULL DEFAULT 0,
      cached_calories_burned REAL NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL DEFAULT (datetime('now')),
      updated_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE TABLE exercise_segments (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      exercise_id INTEGER NOT NULL REFERENCES exercises(id) ON DELETE CASCADE,
      segment_order INTEGER NOT NULL,
      duration_minutes REAL,
      speed_mph REAL,
      distance_miles REAL,
      incline_percent REAL NOT NULL DEFAULT 0,
      avg_heart_rate REAL,
      calculated_field TEXT NOT NULL DEFAULT 'none',
      is_consistent INTEGER NOT NULL DEFAULT 1,
      calories_burned REAL NOT NULL DEFAULT 0,
      weight_used_lbs REAL NOT NULL,
      notes TEXT,
      created_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE TABLE body_weights (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      recorded_on TEXT NOT NULL,
      weight_lbs REAL NOT NULL CHECK (weight_lbs > 0),
      created_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE INDEX idx_exercises_day ON exercises(day_id);
    CREATE INDEX idx_segments_exercise ON exercise_segments(exercise_id);
    CREATE INDEX idx_body_weights_recorded ON body_weights(recorded_on);
    `,
  },
  {
    version: 3,
    name: "batch_updates",
    sql: `
    CREATE TABLE batch_state (
      id INTEGER PRIMARY KEY CHECK (id = 1),
      active INTEGER NOT NULL DEFAULT 0,
      started_at TEXT
    );

    CREATE TABLE batch_pending_foods (
      food_item_id INTEGER PRIMARY KEY
    );

    INSERT INTO batch_state (id, active) VALUES (1, 0);
    `,
  },
];

export const SCHEMA_VERSION = MIGRATIONS.length;

function migrate(db: DB): number {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const row = db
    .prepare<[], { version: number | null }>("SELECT MAX(version) AS version FROM schema_migrations")
    .get();
  const current = row?.version ?? 0;

  const record = db.prepare<[number, string]>("INSERT INTO schema_migrations (version, name) VALUES (?, ?)");
  const apply = db.transaction((pending: Migration[]) => {
    for (const m of pending) {
      db.exec(m.sql);
      record.run(m.version, m.name);
    }
  });
  apply(MIGRATIONS.filter((m) => m.version > current));

  return SCHEMA_VERSION;
}

/**
 * Opens a database and brings its schema up to date. Pass ":memory:" for a
 * throwaway database.
 */
export function openDatabase(path: string): DB {
  const conn = new Database(path);
  if (path !== ":memory:") {
    conn.pragma("journal_mode = WAL");
  }
  conn.pragma("foreign_keys = ON");
  migrate(conn);
  return conn;
}

export function initializeDatabase(): InitResult {
  const cfg = getConfig();

  ensureDir(cfg.dataDir);
  ensureDir(dirname(cfg.dbPath));

  const existed = existsSync(cfg.dbPath);

  if (!db) {
    db = openDatabase(cfg.dbPath);
  }

  return {
    initialized: true,
    dataDir: cfg.dataDir,
    dbPath: cfg.dbPath,
    dbCreated: !existed,
    schemaVersion: SCHEMA_VERSION,
  };
}

export function getDb(): DB {
  if (!db) {
    const result = initializeDatabase();
    if (result.dbCreated) {
      console.error(`Initialized database at ${result.dbPath}`);
    }
  }
  if (!db) {
    throw new Error("Database failed to open");
  }
  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/** Drops cached config and connection so the next call re-reads the environment. */
export function resetDbState(): void {
  closeDb();
  config = null;
}
