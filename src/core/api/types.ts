// src/core/api/types.ts

import { z } from 'zod';

const IdSchema = z.union([z.string().min(1), z.number()]).transform(String);

// Remote payloads vary between API versions; only the fields we key on are checked
export const RawItemSchema = z
  .object({
    id: IdSchema,
    name: z.string().nullish(),
    type: z.string().nullish(),
    parent_id: IdSchema.nullish(),
  })
  .passthrough();

export const RawReviewLinkEntrySchema = z
  .object({
    asset: RawItemSchema,
  })
  .passthrough();

export const RawProjectSchema = z
  .object({
    id: IdSchema,
    name: z.string().nullish(),
    root_asset_id: IdSchema.nullish(),
    root_folder_id: IdSchema.nullish(),
  })
  .passthrough();

export const RawTeamSchema = z
  .object({
    id: IdSchema,
    name: z.string().nullish(),
  })
  .passthrough();

export const RawCommentSchema = z
  .object({
    id: IdSchema,
  })
  .passthrough();

export type RawItem = z.infer<typeof RawItemSchema>;
export type RawComment = z.infer<typeof RawCommentSchema>;

export interface Item {
  id: string;
  name: string;
  kind: string;
  parentId?: string;
  metadata: Record<string, unknown>; // Full raw payload (thumbnail fields, sizes, ...)
}

export interface Team {
  id: string;
  name: string;
}

export interface Project {
  id: string;
  name: string;
  rootId?: string;
}

export interface ProjectRoot {
  projectId: string;
  name: string;
  rootId: string;
}
