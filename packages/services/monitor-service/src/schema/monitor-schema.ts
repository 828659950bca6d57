/**
 * Monitor Service - Schema
 * All tables use the 'mon_' prefix
 */

import {
  pgTable,
  varchar,
  text,
  integer,
  boolean,
  timestamp,
  jsonb,
  doublePrecision,
  uuid,
  index,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import type { HttpMethod } from '../domains/monitoring/entities/Endpoint';
import type { ProbeErrorCategory } from '../domains/monitoring/entities/ProbeResult';
import type { NotificationKind, NotificationStatus } from '../domains/monitoring/entities/NotificationLog';

export const endpoints = pgTable('mon_endpoints', {
  id: uuid('id')
    .primaryKey()
    .default(sql`gen_random_uuid()`),
  name: varchar('name', { length: 255 }).notNull(),
  url: text('url').notNull(),
  method: varchar('method', { length: 10 }).$type<HttpMethod>().notNull().default('GET'),
  interval: integer('interval').notNull().default(60), // seconds
  timeout: integer('timeout').notNull().default(5), // seconds
  expectedStatus: integer('expected_status').notNull().default(200),
  headers: jsonb('headers').$type<Record<string, string>>().notNull().default({}),
  body: jsonb('body'),
  isActive: boolean('is_active').notNull().default(true),
  createdAt: timestamp('created_at').notNull().defaultNow(),
  updatedAt: timestamp('updated_at').notNull().defaultNow(),
});

export const probeResults = pgTable(
  'mon_probe_results',
  {
    id: uuid('id')
      .primaryKey()
      .default(sql`gen_random_uuid()`),
    endpointId: uuid('endpoint_id')
      .notNull()
      .references(() => endpoints.id, { onDelete: 'cascade' }),
    success: boolean('success').notNull(),
    statusCode: integer('status_code'),
    responseTimeMs: doublePrecision('response_time_ms'),
    errorCategory: varchar('error_category', { length: 32 }).$type<ProbeErrorCategory>(),
    errorMessage: text('error_message'),
    checkedAt: timestamp('checked_at').notNull().defaultNow(),
  },
  table => ({
    endpointCheckedIdx: index('idx_mon_probe_results_endpoint_checked').on(table.endpointId, table.checkedAt),
  })
);

export const notificationLogs = pgTable('mon_notification_logs', {
  id: uuid('id')
    .primaryKey()
    .default(sql`gen_random_uuid()`),
  endpointId: uuid('endpoint_id')
    .notNull()
    .references(() => endpoints.id, { onDelete: 'cascade' }),
  channel: varchar('channel', { length: 50 }).notNull(),
  kind: varchar('kind', { length: 20 }).$type<NotificationKind>().notNull(),
  status: varchar('status', { length: 20 }).$type<NotificationStatus>().notNull(),
  message: text('message').notNull(),
  errorMessage: text('error_message'),
  sentAt: timestamp('sent_at').notNull().defaultNow(),
});

export type EndpointRow = typeof endpoints.$inferSelect;
export type ProbeResultRow = typeof probeResults.$inferSelect;
