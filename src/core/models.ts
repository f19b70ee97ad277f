/**
 * ClickUp domain records.
 *
 * Loose zod objects: fields the remote API adds later pass through
 * untouched. Optional fields default to null or an empty collection so
 * callers never see undefined; only `id` and `name` are required.
 */

import { z } from 'zod/v4';
import { ClickUpError } from './errors.js';

const nullableString = z.string().nullable().default(null);
const nullableNumber = z.number().nullable().default(null);

/** ClickUp sends timestamps and some counters as strings or numbers. */
const opaqueString = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => (v === null || v === undefined ? null : String(v)));

function listOf<T extends z.ZodType>(schema: T) {
  return z
    .array(schema)
    .nullish()
    .transform((v) => v ?? []);
}

const looseRecord = z.record(z.string(), z.unknown());

export const UserSchema = z.looseObject({
  id: z.number().int(),
  username: nullableString,
  email: nullableString,
  color: nullableString,
  profilePicture: nullableString,
  initials: nullableString,
});
export type User = z.infer<typeof UserSchema>;

export const StatusSchema = z.looseObject({
  status: z.string(),
  color: nullableString,
  orderindex: z.union([z.string(), z.number()]).nullable().default(null),
  type: nullableString,
});
export type Status = z.infer<typeof StatusSchema>;

export const PrioritySchema = z.looseObject({
  id: opaqueString,
  priority: nullableString,
  color: nullableString,
  orderindex: opaqueString,
});
export type Priority = z.infer<typeof PrioritySchema>;

export const TagSchema = z.looseObject({
  name: z.string(),
  tag_fg: nullableString,
  tag_bg: nullableString,
});
export type Tag = z.infer<typeof TagSchema>;

export const CustomFieldSchema = z.looseObject({
  id: z.string(),
  name: z.string(),
  type: nullableString,
  value: z.unknown().optional(),
});
export type CustomField = z.infer<typeof CustomFieldSchema>;

/** Lightweight back-reference to a list, folder, space or project. */
export const RefSchema = z.looseObject({
  id: z.string(),
  name: nullableString,
  hidden: z.boolean().optional(),
  access: z.boolean().optional(),
});
export type Ref = z.infer<typeof RefSchema>;

export const TaskSchema = z.looseObject({
  id: z.string().min(1),
  custom_id: nullableString,
  name: z.string(),
  text_content: nullableString,
  description: nullableString,
  status: StatusSchema.nullable().default(null),
  orderindex: opaqueString,
  date_created: opaqueString,
  date_updated: opaqueString,
  date_closed: opaqueString,
  date_done: opaqueString,
  archived: z.boolean().default(false),
  creator: UserSchema.nullable().default(null),
  assignees: listOf(UserSchema),
  watchers: listOf(UserSchema),
  checklists: listOf(looseRecord),
  tags: listOf(TagSchema),
  parent: nullableString,
  priority: PrioritySchema.nullable().default(null),
  due_date: opaqueString,
  start_date: opaqueString,
  points: nullableNumber,
  time_estimate: nullableNumber,
  time_spent: nullableNumber,
  custom_fields: listOf(CustomFieldSchema),
  dependencies: listOf(looseRecord),
  linked_tasks: listOf(looseRecord),
  team_id: nullableString,
  url: nullableString,
  permission_level: nullableString,
  list: RefSchema.nullable().default(null),
  project: RefSchema.nullable().default(null),
  folder: RefSchema.nullable().default(null),
  space: RefSchema.nullable().default(null),
});
export type Task = z.infer<typeof TaskSchema>;

export const ListSchema = z.looseObject({
  id: z.string().min(1),
  name: z.string(),
  orderindex: z.number().nullable().default(null),
  content: nullableString,
  status: looseRecord.nullable().default(null),
  priority: looseRecord.nullable().default(null),
  assignee: UserSchema.nullable().default(null),
  task_count: z
    .union([z.number(), z.string()])
    .nullish()
    .transform((v) => (v === null || v === undefined ? null : Number(v))),
  due_date: opaqueString,
  start_date: opaqueString,
  folder: RefSchema.nullable().default(null),
  space: RefSchema.nullable().default(null),
  archived: z.boolean().default(false),
});
export type List = z.infer<typeof ListSchema>;

export const FolderSchema = z.looseObject({
  id: z.string().min(1),
  name: z.string(),
  orderindex: z.number().nullable().default(null),
  override_statuses: z.boolean().default(false),
  hidden: z.boolean().default(false),
  space: RefSchema.nullable().default(null),
  // ClickUp reports folder task counts as strings
  task_count: opaqueString,
  archived: z.boolean().default(false),
  lists: listOf(ListSchema),
});
export type Folder = z.infer<typeof FolderSchema>;

export const SpaceSchema = z.looseObject({
  id: z.string().min(1),
  name: z.string(),
  private: z.boolean().default(false),
  statuses: listOf(StatusSchema),
  multiple_assignees: z.boolean().default(false),
  features: looseRecord.nullish().transform((v) => v ?? {}),
  archived: z.boolean().default(false),
});
export type Space = z.infer<typeof SpaceSchema>;

export const MemberSchema = z.looseObject({
  user: UserSchema,
});
export type Member = z.infer<typeof MemberSchema>;

export const TeamSchema = z.looseObject({
  id: z.string().min(1),
  name: z.string(),
  color: nullableString,
  avatar: nullableString,
  members: listOf(MemberSchema),
});
export type Team = z.infer<typeof TeamSchema>;

export const CommentSchema = z.looseObject({
  id: z.union([z.string(), z.number()]).transform(String),
  comment: listOf(looseRecord),
  comment_text: z.string().default(''),
  user: UserSchema.nullable().default(null),
  date: opaqueString,
  resolved: z.boolean().default(false),
});
export type Comment = z.infer<typeof CommentSchema>;

/** The create-comment endpoint returns ids only, not a full comment. */
export const CreatedCommentSchema = z.looseObject({
  id: z.union([z.string(), z.number()]).transform(String),
  hist_id: nullableString,
  date: opaqueString,
});
export type CreatedComment = z.infer<typeof CreatedCommentSchema>;

/**
 * Parse one record, turning a schema failure into a ClickUpError that
 * names the record kind and the first offending field.
 */
export function parseRecord<T extends z.ZodType>(schema: T, kind: string, data: unknown): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.map(String).join('.')}` : '';
    throw new ClickUpError(`Invalid ${kind} payload${where}: ${issue?.message ?? 'unrecognized shape'}`, {
      responseData: data,
    });
  }
  return result.data;
}

/** Parse each element of a collection, preserving remote order. */
export function parseRecords<T extends z.ZodType>(schema: T, kind: string, data: unknown[]): z.infer<T>[] {
  return data.map((item) => parseRecord(schema, kind, item));
}

/** Short label for a user: username, then email, then id. */
export function userLabel(user: User): string {
  return user.username ?? user.email ?? String(user.id);
}
