import {
  sqliteTable,
  text,
  integer,
  index,
  uniqueIndex,
} from 'drizzle-orm/sqlite-core';

export const THREAD_STATUSES = ['open', 'closed'] as const;
export const MESSAGE_DIRECTIONS = ['in', 'out'] as const;
export const REPLY_SCOPES = ['global', 'plugin'] as const;
export const LEAD_STATUSES = [
  'new',
  'contacted',
  'qualified',
  'won',
  'lost',
] as const;
export const TASK_PRIORITIES = ['low', 'medium', 'high', 'urgent'] as const;
export const BRAND_TONES = ['friendly', 'formal', 'playful'] as const;

export const threads = sqliteTable(
  'threads',
  {
    id: text('id').primaryKey(),
    platform: text('platform').notNull(),
    senderId: text('sender_id').notNull(),
    title: text('title'),
    status: text('status', { enum: THREAD_STATUSES }).notNull().default('open'),
    createdAt: text('created_at').notNull(),
    lastMessageAt: text('last_message_at').notNull(),
  },
  (table) => ({
    platformSenderIdx: uniqueIndex('threads_platform_sender_idx').on(
      table.platform,
      table.senderId,
    ),
    lastMessageIdx: index('threads_last_message_idx').on(table.lastMessageAt),
  }),
);

export const messages = sqliteTable(
  'messages',
  {
    id: text('id').primaryKey(),
    threadId: text('thread_id').notNull(),
    senderId: text('sender_id').notNull(),
    platform: text('platform').notNull(),
    direction: text('direction', { enum: MESSAGE_DIRECTIONS }).notNull(),
    body: text('body').notNull(),
    language: text('language').notNull(),
    receivedAt: text('received_at').notNull(),
    rawPayload: text('raw_payload'),
    fingerprint: text('fingerprint').notNull(),
  },
  (table) => ({
    fingerprintIdx: uniqueIndex('messages_fingerprint_idx').on(
      table.fingerprint,
    ),
    threadReceivedIdx: index('messages_thread_received_idx').on(
      table.threadId,
      table.receivedAt,
    ),
  }),
);

export const savedReplies = sqliteTable(
  'saved_replies',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    language: text('language').notNull(),
    scope: text('scope', { enum: REPLY_SCOPES }).notNull().default('global'),
    pluginName: text('plugin_name'),
    title: text('title').notNull(),
    body: text('body').notNull(),
    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => ({
    scopeLangIdx: index('saved_replies_scope_lang_idx').on(
      table.scope,
      table.language,
    ),
  }),
);

export const leads = sqliteTable(
  'leads',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    threadId: text('thread_id'),
    name: text('name').notNull(),
    phone: text('phone'),
    status: text('status', { enum: LEAD_STATUSES }).notNull().default('new'),
    notes: text('notes').notNull().default(''),
    tags: text('tags', { mode: 'json' })
      .$type<string[]>()
      .notNull()
      .default([]),
    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => ({
    statusIdx: index('leads_status_idx').on(table.status, table.updatedAt),
    threadIdx: index('leads_thread_idx').on(table.threadId),
  }),
);

export const tasks = sqliteTable(
  'tasks',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    leadId: integer('lead_id'),
    description: text('description').notNull(),
    priority: text('priority', { enum: TASK_PRIORITIES })
      .notNull()
      .default('medium'),
    dueAt: text('due_at').notNull(),
    done: integer('done', { mode: 'boolean' }).notNull().default(false),
    createdAt: text('created_at').notNull(),
  },
  (table) => ({
    dueIdx: index('tasks_due_idx').on(table.done, table.dueAt),
  }),
);

export const workspace = sqliteTable('workspace', {
  id: integer('id').primaryKey(),
  businessName: text('business_name').notNull().default(''),
  businessType: text('business_type').notNull().default(''),
  city: text('city').notNull().default(''),
  phone: text('phone').notNull().default(''),
  hours: text('hours').notNull().default(''),
  bookingLink: text('booking_link').notNull().default(''),
  locationLink: text('location_link').notNull().default(''),
  brandTone: text('brand_tone', { enum: BRAND_TONES })
    .notNull()
    .default('friendly'),
  defaultLanguage: text('default_language').notNull().default('en'),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
});

export type ThreadStatus = (typeof THREAD_STATUSES)[number];
export type MessageDirection = (typeof MESSAGE_DIRECTIONS)[number];
export type ReplyScope = (typeof REPLY_SCOPES)[number];
export type LeadStatus = (typeof LEAD_STATUSES)[number];
export type TaskPriority = (typeof TASK_PRIORITIES)[number];
export type BrandTone = (typeof BRAND_TONES)[number];

export type ThreadRow = typeof threads.$inferSelect;
export type MessageRow = typeof messages.$inferSelect;
export type SavedReplyRow = typeof savedReplies.$inferSelect;
export type LeadRow = typeof leads.$inferSelect;
export type TaskRow = typeof tasks.$inferSelect;
export type WorkspaceRow = typeof workspace.$inferSelect;
