import type { AnalysisFilters, TradeFilters } from "@shared/schemas";
import type {
  Account,
  Analysis,
  AnalysisSection,
  Chart,
  Note,
  Setup,
  Trade,
} from "@shared/types/journal";

// Storage seams for the journal services. The drizzle store implements them in
// production; tests use an in-memory store.

export type TradeRecord = Omit<Trade, "id">;
export type AnalysisRecord = Omit<Analysis, "id" | "createdAtUtc"> & { createdAtUtc?: Date | null };

export interface TradeRepository {
  findById(id: number): Promise<Trade | null>;
  list(filters: TradeFilters): Promise<Trade[]>;
  insert(record: TradeRecord): Promise<number>;
  update(id: number, record: TradeRecord): Promise<void>;
  /** Junction rows cascade. Returns false when nothing was deleted. */
  remove(id: number): Promise<boolean>;
}

export interface AnalysisRepository {
  findById(id: number): Promise<Analysis | null>;
  list(filters: AnalysisFilters): Promise<Analysis[]>;
  insert(record: AnalysisRecord): Promise<number>;
  update(id: number, record: AnalysisRecord): Promise<void>;
  /** Trades referencing the analysis keep existing with analysisId unset. */
  remove(id: number): Promise<boolean>;
}

export interface NewAccount {
  name: string;
  broker: string | null;
  currency: string;
  startingBalance: number | null;
  isProp: boolean;
}

export interface NewSetup {
  name: string;
  description: string | null;
}

export interface NoteRepository {
  findById(id: number): Promise<Note | null>;
}

export interface ReferenceRepository {
  accountExists(id: number): Promise<boolean>;
  setupExists(id: number): Promise<boolean>;
  listAccounts(): Promise<Account[]>;
  insertAccount(account: NewAccount): Promise<Account>;
  listSetups(): Promise<Setup[]>;
  findSetupById(id: number): Promise<Setup | null>;
  findSetupByName(name: string): Promise<Setup | null>;
  insertSetup(setup: NewSetup): Promise<Setup>;
}

/** Normalized column values of a note, as the reconciler writes them. */
export interface NoteFields {
  title: string | null;
  body: string;
  tags: string | null;
}

export interface ChartFields {
  chartUrl: string;
  description: string | null;
}

export interface AnalysisSlot {
  analysisId: number;
  section: AnalysisSection;
}

/**
 * One junction table plus the shared child table behind it.
 * `TOwner` identifies the attachment point (a trade id, an analysis section, ...).
 */
export interface ChildRepository<TOwner, TChild extends { id: number }, TFields> {
  listAttached(owner: TOwner): Promise<TChild[]>;
  insert(fields: TFields): Promise<number>;
  update(childId: number, fields: TFields): Promise<void>;
  link(owner: TOwner, childId: number): Promise<void>;
  unlink(owner: TOwner, childId: number): Promise<void>;
  /**
   * Junction rows that hold the child: trade/analysis links for a note;
   * trade, analysis, setup and note links for a chart.
   */
  countLinks(childId: number): Promise<number>;
  /** Junction rows cascade. Removing a note also deletes the charts only it held. */
  remove(childId: number): Promise<void>;
}

export interface JournalStore {
  trades: TradeRepository;
  analyses: AnalysisRepository;
  references: ReferenceRepository;
  tradeNotes: ChildRepository<number, Note, NoteFields>;
  tradeCharts: ChildRepository<number, Chart, ChartFields>;
  analysisNotes: ChildRepository<AnalysisSlot, Note, NoteFields>;
  analysisCharts: ChildRepository<AnalysisSlot, Chart, ChartFields>;
  setupCharts: ChildRepository<number, Chart, ChartFields>;
  noteCharts: ChildRepository<number, Chart, ChartFields>;
  notes: NoteRepository;
  ping(): Promise<void>;
}
