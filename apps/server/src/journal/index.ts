import { createAnalysisService, type AnalysisService } from "./analysisService";
import { createNoteService, type NoteService } from "./noteService";
import { createReferenceService, type ReferenceService } from "./referenceService";
import type { JournalStore } from "./repositories";
import { createTradeService, type TradeService } from "./tradeService";

export interface JournalOptions {
  clock?: () => Date;
  /** Timezone label stamped on records submitted without one. */
  defaultTz?: string;
}

export interface Journal {
  store: JournalStore;
  trades: TradeService;
  analyses: AnalysisService;
  references: ReferenceService;
  notes: NoteService;
}

export function createJournal(store: JournalStore, options: JournalOptions = {}): Journal {
  return {
    store,
    trades: createTradeService(store, options),
    analyses: createAnalysisService(store, options),
    references: createReferenceService(store),
    notes: createNoteService(store),
  };
}

export * from "./errors";
export type { JournalStore } from "./repositories";
