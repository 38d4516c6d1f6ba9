/**
 * Type definitions for messages and message groups.
 */

import { z } from 'zod';

import { PageSchema } from './common';

export const MESSAGE_TYPES = [
  'SMS',
  'LMS',
  'MMS',
  'ATA',
  'CTA',
  'CTI',
  'RCS_SMS',
  'RCS_LMS',
  'RCS_MMS',
  'RCS_TPL',
  'FAX',
  'VOICE',
] as const;

export const MessageTypeSchema = z.enum(MESSAGE_TYPES);

export type MessageType = z.infer<typeof MessageTypeSchema>;

export const KakaoOptionsSchema = z.object({
  pfId: z.string(),
  templateId: z.string().optional(),
  variables: z.record(z.string(), z.string()).optional(),
  disableSms: z.boolean().optional(),
  imageId: z.string().optional(),
});

export type KakaoOptions = z.infer<typeof KakaoOptionsSchema>;

/**
 * Outbound message as accepted by the send endpoints.
 */
export const OutgoingMessageSchema = z.object({
  to: z.string().min(1),
  from: z.string().min(1),
  text: z.string().optional(),
  type: MessageTypeSchema.optional(),
  subject: z.string().optional(),
  imageId: z.string().optional(),
  country: z.string().optional(),
  autoTypeDetect: z.boolean().optional(),
  kakaoOptions: KakaoOptionsSchema.optional(),
  customFields: z.record(z.string(), z.string()).optional(),
});

export type OutgoingMessage = z.infer<typeof OutgoingMessageSchema>;

export const AgentSchema = z.object({
  sdkVersion: z.string(),
  osPlatform: z.string(),
  appId: z.string().optional(),
});

export type Agent = z.infer<typeof AgentSchema>;

export const SendMessageResultSchema = z
  .object({
    groupId: z.string(),
    messageId: z.string(),
    to: z.string().optional(),
    from: z.string().optional(),
    type: z.string().optional(),
    country: z.string().optional(),
    accountId: z.string().optional(),
    statusCode: z.string(),
    statusMessage: z.string().optional(),
  })
  .passthrough();

export type SendMessageResult = z.infer<typeof SendMessageResultSchema>;

export const MessageRecordSchema = z
  .object({
    messageId: z.string(),
    groupId: z.string().optional(),
    to: z.string().optional(),
    from: z.string().optional(),
    type: z.string().optional(),
    text: z.string().nullable().optional(),
    status: z.string().optional(),
    statusCode: z.string().optional(),
    reason: z.string().nullable().optional(),
    dateCreated: z.string().optional(),
    dateUpdated: z.string().optional(),
  })
  .passthrough();

export type MessageRecord = z.infer<typeof MessageRecordSchema>;

export const ListMessagesOutputSchema = PageSchema.extend({
  messageList: z.record(z.string(), MessageRecordSchema),
}).passthrough();

export type ListMessagesOutput = z.infer<typeof ListMessagesOutputSchema>;

export const GroupCountSchema = z
  .object({
    total: z.number().optional(),
    sentTotal: z.number().optional(),
    sentFailed: z.number().optional(),
    sentSuccess: z.number().optional(),
    sentPending: z.number().optional(),
    registeredFailed: z.number().optional(),
    registeredSuccess: z.number().optional(),
  })
  .passthrough();

export const GroupSchema = z
  .object({
    groupId: z.string(),
    status: z.string().optional(),
    count: GroupCountSchema.optional(),
    agent: AgentSchema.partial().optional(),
    dateCreated: z.string().optional(),
    dateUpdated: z.string().optional(),
    dateSent: z.string().nullable().optional(),
    dateCompleted: z.string().nullable().optional(),
  })
  .passthrough();

export type Group = z.infer<typeof GroupSchema>;

export const ListGroupsOutputSchema = PageSchema.extend({
  groupList: z.record(z.string(), GroupSchema),
}).passthrough();

export type ListGroupsOutput = z.infer<typeof ListGroupsOutputSchema>;

export const AddGroupMessagesOutputSchema = z
  .object({
    errorCount: z.number(),
    resultList: z
      .array(
        z
          .object({
            to: z.string().optional(),
            from: z.string().optional(),
            type: z.string().optional(),
            statusCode: z.string(),
            statusMessage: z.string().optional(),
            messageId: z.string().optional(),
          })
          .passthrough()
      )
      .optional(),
  })
  .passthrough();

export type AddGroupMessagesOutput = z.infer<typeof AddGroupMessagesOutputSchema>;
