export type EntryMetadata = {
  auth_header: string | null;
  client_ip: string | null;
  user_agent: string | null;
  windows_username: string | null;
  file_extension: string | null;
  operation_type: string | null;
  git_branch: string | null;
  project: string | null;
  editor: string | null;
  platform: string | null;
  event_time: string | null;
  absolute_filepath: string | null;
  event_type: string | null;
  language: string | null;
};

// Inputs to row_hash. Everything else on an Entry is excluded from dedup.
export type HashedFields = {
  method: string;
  path: string;
  query: Record<string, string>;
  request_body: string;
  response_status: number;
};

export type Entry = Readonly<
  HashedFields & {
    timestamp: string;
    request_headers: Record<string, string>;
    response_headers: Record<string, string>;
    response_body: string;
    duration_ms: number;
    row_hash: string;
  } & EntryMetadata
>;
