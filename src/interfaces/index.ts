export interface Artist {
  name: string;
}

export interface Track {
  name: string;
  artists: Artist[];
  uri?: string;
}

export interface PlaylistItem {
  track: Track | null;
}

export interface Playlist {
  tracks: {
    items: PlaylistItem[];
  };
}

export interface SongSuggestion {
  name: string;
  artist: string;
}

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
}

export interface ChatCompletionResponse {
  choices: {
    message: {
      content: string;
    };
  }[];
}

export interface TokenResponse {
  access_token: string;
}

export interface RunOptions {
  count?: number;
  code?: string;
  dryRun: boolean;
}

export interface RunResult {
  playlistText: string;
  suggestions: SongSuggestion[];
  resolvedUris: string[];
  unresolved: SongSuggestion[];
  added: number;
}
