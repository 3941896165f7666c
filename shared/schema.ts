import { pgTable, text, uuid, integer, boolean, timestamp, jsonb, real, index, uniqueIndex } from "drizzle-orm/pg-core";
import { sql } from "drizzle-orm";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

export const imageTypes = ['original', 'preprocessed'] as const;
export type ImageType = typeof imageTypes[number];

export const inferenceStatuses = ['success', 'failed'] as const;
export type InferenceStatus = typeof inferenceStatuses[number];

// ACTIVATE/SLEEP are the legacy commands; current firmware drives the servo directly
export const controlCommands = ['ACTIVATE', 'SLEEP', 'ACTIVATE_SERVO', 'STOP_SERVO'] as const;
export type ControlCommand = typeof controlCommands[number];

export const controlStatuses = ['PENDING', 'EXECUTED', 'FAILED'] as const;
export type ControlStatus = typeof controlStatuses[number];

export const reportableControlStatuses = ['EXECUTED', 'FAILED'] as const;
export type ReportableControlStatus = typeof reportableControlStatuses[number];

export const ALERT_TYPE_LARVA_DETECTED = 'LARVA_DETECTED';
export const PARSING_VERSION = '1.0';

export const devices = pgTable("devices", {
  id: uuid("id").primaryKey().defaultRandom(),
  deviceCode: text("device_code").notNull().unique(),
  location: text("location"),
  description: text("description"),
  isActive: boolean("is_active").notNull().default(true),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
});

export const insertDeviceSchema = createInsertSchema(devices, {
  deviceCode: (schema) => schema.min(1).max(100).regex(/^[A-Za-z0-9_-]+$/),
}).omit({
  id: true,
  createdAt: true,
});
export type Device = typeof devices.$inferSelect;
export type InsertDevice = z.infer<typeof insertDeviceSchema>;

export const deviceAuth = pgTable("device_auth", {
  id: uuid("id").primaryKey().defaultRandom(),
  deviceId: uuid("device_id").notNull().references(() => devices.id, { onDelete: 'cascade' }),
  deviceCode: text("device_code").notNull().unique(),
  passwordHash: text("password_hash").notNull(), // scrypt "hash.salt"
});

export type DeviceAuth = typeof deviceAuth.$inferSelect;

export const images = pgTable("images", {
  id: uuid("id").primaryKey().defaultRandom(),
  deviceId: uuid("device_id").notNull().references(() => devices.id, { onDelete: 'cascade' }),
  deviceCode: text("device_code").notNull(),
  imageType: text("image_type").$type<ImageType>().notNull(),
  imagePath: text("image_path").notNull(),
  width: integer("width").notNull(),
  height: integer("height").notNull(),
  checksum: text("checksum").notNull(), // sha256 hex
  capturedAt: timestamp("captured_at", { withTimezone: true }),
  uploadedAt: timestamp("uploaded_at", { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  deviceCodeIdx: index("images_device_code_idx").on(table.deviceCode),
  uploadedAtIdx: index("images_uploaded_at_idx").on(table.uploadedAt),
}));

export type Image = typeof images.$inferSelect;
export type InsertImage = Omit<typeof images.$inferInsert, "id">;

// Append-only: one row per inference attempt, success or failure
export const inferenceResults = pgTable("inference_results", {
  id: uuid("id").primaryKey().defaultRandom(),
  imageId: uuid("image_id").notNull().references(() => images.id, { onDelete: 'cascade' }),
  deviceId: uuid("device_id").notNull().references(() => devices.id, { onDelete: 'cascade' }),
  deviceCode: text("device_code").notNull(),
  inferenceAt: timestamp("inference_at", { withTimezone: true }).notNull().defaultNow(),
  rawPrediction: jsonb("raw_prediction").$type<unknown>(),
  totalObjects: integer("total_objects").notNull().default(0),
  totalTarget: integer("total_target").notNull().default(0),
  totalOther: integer("total_other").notNull().default(0),
  avgConfidence: real("avg_confidence").notNull().default(0),
  parsingVersion: text("parsing_version"),
  status: text("status").$type<InferenceStatus>().notNull(),
  errorMessage: text("error_message"),
}, (table) => ({
  deviceTimeIdx: index("inference_results_device_time_idx").on(table.deviceCode, table.inferenceAt),
  statusIdx: index("inference_results_status_idx").on(table.status),
}));

export type InferenceResult = typeof inferenceResults.$inferSelect;
export type InsertInferenceResult = Omit<typeof inferenceResults.$inferInsert, "id">;

export const alerts = pgTable("alerts", {
  id: uuid("id").primaryKey().defaultRandom(),
  deviceId: uuid("device_id").notNull().references(() => devices.id, { onDelete: 'cascade' }),
  deviceCode: text("device_code").notNull(),
  alertType: text("alert_type").notNull().default(ALERT_TYPE_LARVA_DETECTED),
  alertLevel: text("alert_level").notNull(), // detection status at trigger time
  alertMessage: text("alert_message"),
  detectionCount: integer("detection_count").notNull(),
  resolved: boolean("resolved").notNull().default(false),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  resolvedAt: timestamp("resolved_at", { withTimezone: true }),
}, (table) => ({
  deviceCodeIdx: index("alerts_device_code_idx").on(table.deviceCode),
  oneOpenPerDevice: uniqueIndex("alerts_one_open_per_device_idx")
    .on(table.deviceId)
    .where(sql`${table.resolved} = false`),
}));

export type Alert = typeof alerts.$inferSelect;
export type InsertAlert = Omit<typeof alerts.$inferInsert, "id" | "resolved" | "resolvedAt">;

// Single-slot mailbox: exactly one row per device
export const deviceControls = pgTable("device_controls", {
  id: uuid("id").primaryKey().defaultRandom(),
  deviceId: uuid("device_id").notNull().unique().references(() => devices.id, { onDelete: 'cascade' }),
  deviceCode: text("device_code").notNull().unique(),
  controlCommand: text("control_command").$type<ControlCommand>().notNull(),
  status: text("status").$type<ControlStatus>().notNull().default('PENDING'),
  message: text("message"),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});

export type DeviceControl = typeof deviceControls.$inferSelect;

export interface UpsertDeviceControl {
  deviceId: string;
  deviceCode: string;
  controlCommand: ControlCommand;
  status: ControlStatus;
  message: string | null;
  updatedAt: Date;
}

export interface ParsedPrediction {
  totalObjects: number;
  totalTarget: number;
  totalOther: number;
  avgConfidence: number;
}
