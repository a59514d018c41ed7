import type { PersonaAssignment, TimelineBucket, UserProfileSummary } from "@persona/contracts";

export type DomainEvents = {
  "dataset.loaded": {
    run_id: string;
    record_count: number;
    user_count: number;
  };
  "persona.assigned": {
    run_id: string;
    assignment: PersonaAssignment;
    profile?: UserProfileSummary;
  };
  "timeline.ready": {
    run_id: string;
    user_id: string;
    buckets: TimelineBucket[];
  };
  "persona.skipped": {
    run_id: string;
    user_id: string;
    reason: string;
    code?: string;
  };
  "run.completed": {
    run_id: string;
    assigned: number;
    skipped: number;
  };
};

export type DomainEventName = keyof DomainEvents;
