export const POST_STATUSES = ['draft', 'scheduled', 'published', 'error'] as const;
export type PostStatus = (typeof POST_STATUSES)[number];

export const POST_FORMATS = ['photo', 'video'] as const;
export type PostFormat = (typeof POST_FORMATS)[number];

export interface PostRecord {
  id: string;
  accountId: string;
  text: string;
  media: string[]; // filenames under the media dirs
  format: PostFormat;
  status: PostStatus;
  scheduledAt: number | null; // epoch ms, set iff status === 'scheduled'
  createdAt: number;
  publishedAt: number | null; // epoch ms, set iff status === 'published'
  lastError: string | null;
}

export type ScheduleMirrorStatus = 'scheduled' | 'published';

export interface ScheduleEntry {
  postId: string;
  scheduledAt: number;
  status: ScheduleMirrorStatus;
}

export type AccountStatus = 'active' | 'inactive' | 'error' | 'logging_in';

export interface AccountRecord {
  id: string;
  username: string;
  status: AccountStatus;
  lastLogin: number | null;
  lastError: string | null;
  createdAt: number;
}

export type PostPartitions = Record<PostStatus, Record<string, PostRecord>>;

export interface DBSchema {
  posts: PostPartitions;
  schedule: Record<string, ScheduleEntry[]>;
  accounts: AccountRecord[];
}
