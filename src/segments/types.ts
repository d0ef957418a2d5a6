export type SegmentId = "usage";

/** One rendered piece of the status line. */
export type SegmentData = {
  primary: string;
  secondary: string;
  metadata: Record<string, string>;
};

/** Session JSON that Claude Code pipes to its `statusLine` command. */
export type StatuslineInput = {
  session_id?: string;
  transcript_path?: string;
  cwd?: string;
  model?: { id?: string; display_name?: string };
  workspace?: { current_dir?: string; project_dir?: string };
  version?: string;
};

export interface Segment {
  readonly id: SegmentId;
  /** Resolves to `null` when the segment has nothing to show; never rejects. */
  collect(input: StatuslineInput): Promise<SegmentData | null>;
}

export type CredentialProvider = {
  getToken: () => Promise<string | undefined>;
};

export type SegmentOptionsProvider = {
  getSegmentOptions: (id: SegmentId) => Record<string, unknown> | undefined;
};
