/**
 * Type definitions for storage resources.
 */

import { z } from 'zod';

import { PageSchema } from './common';

export const FILE_TYPES = ['MMS', 'DOCUMENT', 'RCS', 'FAX', 'KAKAO'] as const;

export type FileType = (typeof FILE_TYPES)[number];

export const StorageFileSchema = z
  .object({
    fileId: z.string(),
    type: z.string().optional(),
    name: z.string().nullable().optional(),
    originalName: z.string().nullable().optional(),
    link: z.string().nullable().optional(),
    url: z.string().nullable().optional(),
    accountId: z.string().optional(),
    dateCreated: z.string().optional(),
    dateUpdated: z.string().optional(),
  })
  .passthrough();

export type StorageFile = z.infer<typeof StorageFileSchema>;

export const ListFilesOutputSchema = PageSchema.extend({
  fileList: z.record(z.string(), StorageFileSchema),
}).passthrough();

export type ListFilesOutput = z.infer<typeof ListFilesOutputSchema>;
