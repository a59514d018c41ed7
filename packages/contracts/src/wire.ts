import type { PersonaAssignment, TimelineBucket, UserProfileSummary } from "./index";
import type { PersonaEngineErrorCode } from "./errors";

export type SkippedUserPayload = {
  userId: string;
  code: PersonaEngineErrorCode;
  reason: string;
};

export type AnalyzeResponse = {
  assignments: PersonaAssignment[];
  timelines: Record<string, TimelineBucket[]>;
  profiles: Record<string, UserProfileSummary>;
  skipped: SkippedUserPayload[];
};

export type UserPersonaResponse = {
  assignment: PersonaAssignment;
  timeline: TimelineBucket[];
  profile: UserProfileSummary | null;
  badge: { label: string; color: string; className: string };
  explainer: string | null;
  card: string[];
};

export type UserSearchResponse = {
  userIds: string[];
};

export type CatalogResponse = {
  archetypes: Array<{
    label: string;
    description: string | null;
    color: string | null;
    icon: string | null;
  }>;
};

export type ErrorResponse = {
  error: string;
  message?: string;
};
