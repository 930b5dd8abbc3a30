export const FLOWDOCK_API_URL = 'https://api.flowdock.com/v1';

/** Message destined for a team's inbox, before routing to a flow. */
export interface TeamInboxMessage {
  teamName: string | null;
  subject: string;
  textContent: string;
  project?: string | null;
  link?: string;
}

/** Body of POST /messages/team_inbox/:flow_api_token */
export interface TeamInboxPayload {
  source: string;
  from_address: string;
  subject: string;
  content: string;
  format: 'html';
  tags: string[];
  from_name?: string;
  project?: string;
  link?: string;
}

/** Body of POST /messages/chat/:flow_api_token */
export interface ChatPayload {
  external_user_name: string;
  content: string;
  tags: string[];
}

export type PostOutcome = 'posted' | 'skipped';
