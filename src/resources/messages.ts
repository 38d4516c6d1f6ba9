/**
 * Message and message group endpoints.
 */

import { RequesterProtocol } from '../client-types';
import {
  AddGroupMessagesOutput,
  AddGroupMessagesOutputSchema,
  Agent,
  Group,
  GroupSchema,
  ListGroupsOutput,
  ListGroupsOutputSchema,
  ListMessagesOutput,
  ListMessagesOutputSchema,
  MessageType,
  OutgoingMessage,
  SendMessageResult,
  SendMessageResultSchema,
} from '../types';

export interface ListMessagesQuery {
  messageId?: string | null;
  groupId?: string | null;
  to?: string | null;
  from?: string | null;
  type?: MessageType | null;
  statusCode?: string | null;
  dateType?: 'CREATED' | 'UPDATED' | null;
  startDate?: string | null;
  endDate?: string | null;
  limit?: number | null;
  startKey?: string | null;
}

export interface ListGroupsQuery {
  status?: string | null;
  startDate?: string | null;
  endDate?: string | null;
  limit?: number | null;
  startKey?: string | null;
}

const groupPath = (groupId: string) => `messages/v4/groups/${encodeURIComponent(groupId)}`;

export class MessagesAPI {
  constructor(private requester: RequesterProtocol) {}

  /**
   * Client identification attached to every send request.
   */
  get agent(): Agent {
    const { sdkVersion, osPlatform, appId } = this.requester.config;
    return appId ? { sdkVersion, osPlatform, appId } : { sdkVersion, osPlatform };
  }

  async send(message: OutgoingMessage): Promise<SendMessageResult> {
    return this.requester.post(
      'messages/v4/send',
      { message, agent: this.agent },
      SendMessageResultSchema
    );
  }

  async sendMany(messages: OutgoingMessage[]): Promise<Group> {
    return this.requester.post(
      'messages/v4/send-many',
      { messages, agent: this.agent },
      GroupSchema
    );
  }

  async list(query: ListMessagesQuery = {}): Promise<ListMessagesOutput> {
    return this.requester.get('messages/v4/list', { ...query }, ListMessagesOutputSchema);
  }

  async createGroup(): Promise<Group> {
    return this.requester.post('messages/v4/groups', { agent: this.agent }, GroupSchema);
  }

  async addGroupMessages(
    groupId: string,
    messages: OutgoingMessage[]
  ): Promise<AddGroupMessagesOutput> {
    return this.requester.put(
      `${groupPath(groupId)}/messages`,
      { messages },
      AddGroupMessagesOutputSchema
    );
  }

  async sendGroup(groupId: string): Promise<Group> {
    return this.requester.post(`${groupPath(groupId)}/send`, undefined, GroupSchema);
  }

  async getGroup(groupId: string): Promise<Group> {
    return this.requester.get(groupPath(groupId), undefined, GroupSchema);
  }

  async listGroups(query: ListGroupsQuery = {}): Promise<ListGroupsOutput> {
    return this.requester.get('messages/v4/groups', { ...query }, ListGroupsOutputSchema);
  }

  async listGroupMessages(
    groupId: string,
    options?: { limit?: number | null; startKey?: string | null }
  ): Promise<ListMessagesOutput> {
    return this.requester.get(
      `${groupPath(groupId)}/messages`,
      { limit: options?.limit, startKey: options?.startKey },
      ListMessagesOutputSchema
    );
  }

  async deleteGroup(groupId: string): Promise<Group> {
    return this.requester.delete(groupPath(groupId), undefined, GroupSchema);
  }
}
