import type { AnalysisRecord, ChartFields, ChildRepository, JournalStore, NoteFields, TradeRecord } from '@server/journal/repositories';
import type { AnalysisFilters, TradeFilters, TradeOrderColumn } from '@shared/schemas';
import type { Account, Analysis, AnalysisSection, Chart, Note, Setup, Trade } from '@shared/types/journal';
import { parseTags } from '@shared/utils/tags';

type StoredNote = NoteFields & { id: number; createdAt: Date };
type StoredChart = ChartFields & { id: number; createdAt: Date };

interface OwnerLink {
  ownerId: number;
  childId: number;
}

interface SectionLink extends OwnerLink {
  section: AnalysisSection;
}

type Comparable = string | number | null;

// Postgres puts NULLs last ascending and first descending
function compareValues(a: Comparable, b: Comparable): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  return String(a).localeCompare(String(b));
}

/**
 * In-process stand-in for the drizzle store. Mirrors the table semantics the
 * services rely on: junction cascades, ON DELETE SET NULL on trade references,
 * link counting per child table, charts collected with the note that held them.
 *
 * `writes` records every mutating call; `failOn` makes the next call of one
 * operation throw, to exercise partial failures.
 */
export class MemoryJournalStore implements JournalStore {
  readonly tradeRows = new Map<number, Trade>();
  readonly analysisRows = new Map<number, Analysis>();
  readonly accountRows = new Map<number, Account>();
  readonly setupRows = new Map<number, Setup>();
  readonly noteRows = new Map<number, StoredNote>();
  readonly chartRows = new Map<number, StoredChart>();

  tradeNoteLinks: OwnerLink[] = [];
  tradeChartLinks: OwnerLink[] = [];
  analysisNoteLinks: SectionLink[] = [];
  analysisChartLinks: SectionLink[] = [];
  setupChartLinks: OwnerLink[] = [];
  noteChartLinks: OwnerLink[] = [];

  readonly writes: string[] = [];
  private readonly failures = new Map<string, Error>();
  private sequence = 0;
  private available = true;

  failOn(operation: string, error: Error = new Error(`${operation} failed`)): void {
    this.failures.set(operation, error);
  }

  setAvailable(available: boolean): void {
    this.available = available;
  }

  resetWrites(): void {
    this.writes.length = 0;
  }

  private nextId(): number {
    this.sequence += 1;
    return this.sequence;
  }

  private check(operation: string): void {
    const failure = this.failures.get(operation);
    if (failure) {
      this.failures.delete(operation);
      throw failure;
    }
  }

  private write(operation: string): void {
    this.check(operation);
    this.writes.push(operation);
  }

  private noteLinkCount(noteId: number): number {
    return (
      this.tradeNoteLinks.filter((link) => link.childId === noteId).length +
      this.analysisNoteLinks.filter((link) => link.childId === noteId).length
    );
  }

  private chartLinkCount(chartId: number): number {
    return (
      this.tradeChartLinks.filter((link) => link.childId === chartId).length +
      this.analysisChartLinks.filter((link) => link.childId === chartId).length +
      this.setupChartLinks.filter((link) => link.childId === chartId).length +
      this.noteChartLinks.filter((link) => link.childId === chartId).length
    );
  }

  private toNote(stored: StoredNote): Note {
    return { id: stored.id, title: stored.title, body: stored.body, tags: parseTags(stored.tags), createdAt: stored.createdAt };
  }

  private toChart(stored: StoredChart): Chart {
    return { ...stored };
  }

  private insertNote(operation: string, fields: NoteFields): number {
    this.write(operation);
    const id = this.nextId();
    this.noteRows.set(id, { ...fields, id, createdAt: new Date() });
    return id;
  }

  private insertChart(operation: string, fields: ChartFields): number {
    this.write(operation);
    const id = this.nextId();
    this.chartRows.set(id, { ...fields, id, createdAt: new Date() });
    return id;
  }

  private removeChart(chartId: number): void {
    this.chartRows.delete(chartId);
    this.tradeChartLinks = this.tradeChartLinks.filter((link) => link.childId !== chartId);
    this.analysisChartLinks = this.analysisChartLinks.filter((link) => link.childId !== chartId);
    this.setupChartLinks = this.setupChartLinks.filter((link) => link.childId !== chartId);
    this.noteChartLinks = this.noteChartLinks.filter((link) => link.childId !== chartId);
  }

  private notesFor(links: OwnerLink[]): Note[] {
    return links
      .map((link) => this.noteRows.get(link.childId))
      .filter((note): note is StoredNote => note !== undefined)
      .sort((a, b) => a.id - b.id)
      .map((note) => this.toNote(note));
  }

  private chartsFor(links: OwnerLink[]): Chart[] {
    return links
      .map((link) => this.chartRows.get(link.childId))
      .filter((chart): chart is StoredChart => chart !== undefined)
      .sort((a, b) => a.id - b.id)
      .map((chart) => this.toChart(chart));
  }

  private noteTable(prefix: string) {
    return {
      insert: async (fields: NoteFields) => this.insertNote(`${prefix}.insert`, fields),
      update: async (childId: number, fields: NoteFields) => {
        this.write(`${prefix}.update`);
        const stored = this.noteRows.get(childId);
        if (stored) this.noteRows.set(childId, { ...stored, ...fields });
      },
      countLinks: async (childId: number) => {
        this.check(`${prefix}.countLinks`);
        return this.noteLinkCount(childId);
      },
      remove: async (childId: number) => {
        this.write(`${prefix}.remove`);
        const charts = this.noteChartLinks.filter((link) => link.ownerId === childId).map((link) => link.childId);
        this.noteRows.delete(childId);
        this.noteChartLinks = this.noteChartLinks.filter((link) => link.ownerId !== childId);
        for (const chartId of charts) {
          if (this.chartLinkCount(chartId) === 0) this.removeChart(chartId);
        }
      },
    };
  }

  private chartTable(prefix: string) {
    return {
      insert: async (fields: ChartFields) => this.insertChart(`${prefix}.insert`, fields),
      update: async (childId: number, fields: ChartFields) => {
        this.write(`${prefix}.update`);
        const stored = this.chartRows.get(childId);
        if (stored) this.chartRows.set(childId, { ...stored, ...fields });
      },
      countLinks: async (childId: number) => {
        this.check(`${prefix}.countLinks`);
        return this.chartLinkCount(childId);
      },
      remove: async (childId: number) => {
        this.write(`${prefix}.remove`);
        this.removeChart(childId);
      },
    };
  }

  readonly trades: JournalStore['trades'] = {
    findById: async (id) => {
      this.check('trades.findById');
      const trade = this.tradeRows.get(id);
      return trade ? { ...trade, emotionalProblems: [...trade.emotionalProblems] } : null;
    },
    list: async (filters: TradeFilters) => {
      this.check('trades.list');
      const rows = [...this.tradeRows.values()].filter(
        (trade) =>
          (filters.accountId == null || trade.accountId === filters.accountId) &&
          (filters.setupId == null || trade.setupId === filters.setupId) &&
          (filters.analysisId == null || trade.analysisId === filters.analysisId) &&
          (filters.asset == null || trade.asset === filters.asset) &&
          (filters.state == null || trade.state === filters.state) &&
          (filters.result == null || trade.result === filters.result) &&
          (filters.session == null || trade.session === filters.session) &&
          (!filters.dateFrom || trade.dateLocal >= filters.dateFrom) &&
          (!filters.dateTo || trade.dateLocal <= filters.dateTo)
      );

      const orderBy: TradeOrderColumn | undefined = filters.orderBy;
      const sign = filters.direction === 'desc' ? -1 : 1;
      return rows.sort((a, b) => {
        if (orderBy) {
          const primary = a[orderBy] === b[orderBy] ? 0 : sign * compareValues(a[orderBy], b[orderBy]);
          return primary || a.id - b.id;
        }
        return a.dateLocal.localeCompare(b.dateLocal) || a.id - b.id;
      });
    },
    insert: async (record: TradeRecord) => {
      this.write('trades.insert');
      const id = this.nextId();
      this.tradeRows.set(id, { ...record, id });
      return id;
    },
    update: async (id, record) => {
      this.write('trades.update');
      if (this.tradeRows.has(id)) this.tradeRows.set(id, { ...record, id });
    },
    remove: async (id) => {
      this.write('trades.remove');
      const existed = this.tradeRows.delete(id);
      this.tradeNoteLinks = this.tradeNoteLinks.filter((link) => link.ownerId !== id);
      this.tradeChartLinks = this.tradeChartLinks.filter((link) => link.ownerId !== id);
      return existed;
    },
  };

  readonly analyses: JournalStore['analyses'] = {
    findById: async (id) => {
      this.check('analyses.findById');
      const analysis = this.analysisRows.get(id);
      return analysis ? { ...analysis } : null;
    },
    list: async (filters: AnalysisFilters) => {
      this.check('analyses.list');
      return [...this.analysisRows.values()]
        .filter(
          (analysis) =>
            (filters.asset == null || analysis.asset === filters.asset) &&
            (!filters.dateFrom || analysis.dateLocal >= filters.dateFrom) &&
            (!filters.dateTo || analysis.dateLocal <= filters.dateTo)
        )
        .sort(
          (a, b) =>
            b.dateLocal.localeCompare(a.dateLocal) || b.timeLocal.localeCompare(a.timeLocal) || b.id - a.id
        );
    },
    insert: async (record: AnalysisRecord) => {
      this.write('analyses.insert');
      const id = this.nextId();
      this.analysisRows.set(id, { ...record, id, createdAtUtc: record.createdAtUtc ?? new Date() });
      return id;
    },
    update: async (id, record) => {
      this.write('analyses.update');
      const current = this.analysisRows.get(id);
      if (current) this.analysisRows.set(id, { ...record, id, createdAtUtc: current.createdAtUtc });
    },
    remove: async (id) => {
      this.write('analyses.remove');
      const existed = this.analysisRows.delete(id);
      this.analysisNoteLinks = this.analysisNoteLinks.filter((link) => link.ownerId !== id);
      this.analysisChartLinks = this.analysisChartLinks.filter((link) => link.ownerId !== id);
      for (const trade of this.tradeRows.values()) {
        if (trade.analysisId === id) trade.analysisId = null;
      }
      return existed;
    },
  };

  readonly references: JournalStore['references'] = {
    accountExists: async (id) => this.accountRows.has(id),
    setupExists: async (id) => this.setupRows.has(id),
    listAccounts: async () =>
      [...this.accountRows.values()].filter((account) => !account.archived).sort((a, b) => a.id - b.id),
    insertAccount: async (account) => {
      this.write('accounts.insert');
      const stored: Account = { ...account, id: this.nextId(), archived: false, createdAt: new Date() };
      this.accountRows.set(stored.id, stored);
      return { ...stored };
    },
    listSetups: async () => [...this.setupRows.values()].sort((a, b) => a.name.localeCompare(b.name)),
    findSetupById: async (id) => {
      const setup = this.setupRows.get(id);
      return setup ? { ...setup } : null;
    },
    findSetupByName: async (name) => [...this.setupRows.values()].find((setup) => setup.name === name) ?? null,
    insertSetup: async (setup) => {
      this.write('setups.insert');
      const stored: Setup = { ...setup, id: this.nextId(), createdAt: new Date() };
      this.setupRows.set(stored.id, stored);
      return { ...stored };
    },
  };

  readonly tradeNotes: ChildRepository<number, Note, NoteFields> = {
    ...this.noteTable('tradeNotes'),
    listAttached: async (tradeId) => {
      this.check('tradeNotes.listAttached');
      return this.notesFor(this.tradeNoteLinks.filter((link) => link.ownerId === tradeId));
    },
    link: async (tradeId, noteId) => {
      this.write('tradeNotes.link');
      this.tradeNoteLinks.push({ ownerId: tradeId, childId: noteId });
    },
    unlink: async (tradeId, noteId) => {
      this.write('tradeNotes.unlink');
      this.tradeNoteLinks = this.tradeNoteLinks.filter(
        (link) => !(link.ownerId === tradeId && link.childId === noteId)
      );
    },
  };

  readonly tradeCharts: ChildRepository<number, Chart, ChartFields> = {
    ...this.chartTable('tradeCharts'),
    listAttached: async (tradeId) => {
      this.check('tradeCharts.listAttached');
      return this.chartsFor(this.tradeChartLinks.filter((link) => link.ownerId === tradeId));
    },
    link: async (tradeId, chartId) => {
      this.write('tradeCharts.link');
      this.tradeChartLinks.push({ ownerId: tradeId, childId: chartId });
    },
    unlink: async (tradeId, chartId) => {
      this.write('tradeCharts.unlink');
      this.tradeChartLinks = this.tradeChartLinks.filter(
        (link) => !(link.ownerId === tradeId && link.childId === chartId)
      );
    },
  };

  readonly analysisNotes: JournalStore['analysisNotes'] = {
    ...this.noteTable('analysisNotes'),
    listAttached: async ({ analysisId, section }) => {
      this.check('analysisNotes.listAttached');
      return this.notesFor(
        this.analysisNoteLinks.filter((link) => link.ownerId === analysisId && link.section === section)
      );
    },
    link: async ({ analysisId, section }, noteId) => {
      this.write('analysisNotes.link');
      this.analysisNoteLinks.push({ ownerId: analysisId, childId: noteId, section });
    },
    unlink: async ({ analysisId, section }, noteId) => {
      this.write('analysisNotes.unlink');
      this.analysisNoteLinks = this.analysisNoteLinks.filter(
        (link) => !(link.ownerId === analysisId && link.childId === noteId && link.section === section)
      );
    },
  };

  readonly analysisCharts: JournalStore['analysisCharts'] = {
    ...this.chartTable('analysisCharts'),
    listAttached: async ({ analysisId, section }) => {
      this.check('analysisCharts.listAttached');
      return this.chartsFor(
        this.analysisChartLinks.filter((link) => link.ownerId === analysisId && link.section === section)
      );
    },
    link: async ({ analysisId, section }, chartId) => {
      this.write('analysisCharts.link');
      this.analysisChartLinks.push({ ownerId: analysisId, childId: chartId, section });
    },
    unlink: async ({ analysisId, section }, chartId) => {
      this.write('analysisCharts.unlink');
      this.analysisChartLinks = this.analysisChartLinks.filter(
        (link) => !(link.ownerId === analysisId && link.childId === chartId && link.section === section)
      );
    },
  };

  readonly setupCharts: JournalStore['setupCharts'] = {
    ...this.chartTable('setupCharts'),
    listAttached: async (setupId) => {
      this.check('setupCharts.listAttached');
      return this.chartsFor(this.setupChartLinks.filter((link) => link.ownerId === setupId));
    },
    link: async (setupId, chartId) => {
      this.write('setupCharts.link');
      this.setupChartLinks.push({ ownerId: setupId, childId: chartId });
    },
    unlink: async (setupId, chartId) => {
      this.write('setupCharts.unlink');
      this.setupChartLinks = this.setupChartLinks.filter(
        (link) => !(link.ownerId === setupId && link.childId === chartId)
      );
    },
  };

  readonly noteCharts: JournalStore['noteCharts'] = {
    ...this.chartTable('noteCharts'),
    listAttached: async (noteId) => {
      this.check('noteCharts.listAttached');
      return this.chartsFor(this.noteChartLinks.filter((link) => link.ownerId === noteId));
    },
    link: async (noteId, chartId) => {
      this.write('noteCharts.link');
      this.noteChartLinks.push({ ownerId: noteId, childId: chartId });
    },
    unlink: async (noteId, chartId) => {
      this.write('noteCharts.unlink');
      this.noteChartLinks = this.noteChartLinks.filter(
        (link) => !(link.ownerId === noteId && link.childId === chartId)
      );
    },
  };

  readonly notes: JournalStore['notes'] = {
    findById: async (id) => {
      const stored = this.noteRows.get(id);
      return stored ? this.toNote(stored) : null;
    },
  };

  async ping(): Promise<void> {
    if (!this.available) {
      throw new Error('connection refused');
    }
  }

  // ---- seeding helpers for tests ---------------------------------------------

  addAccount(name = 'Main'): Account {
    const account: Account = {
      id: this.nextId(),
      name,
      broker: null,
      currency: 'USD',
      startingBalance: null,
      isProp: false,
      archived: false,
      createdAt: new Date(),
    };
    this.accountRows.set(account.id, account);
    return account;
  }

  addAnalysis(asset = 'EURUSD'): Analysis {
    const analysis: Analysis = {
      id: this.nextId(),
      createdAtUtc: new Date(),
      localTz: 'UTC+3',
      dateLocal: '2024-03-01',
      timeLocal: '08:00:00',
      asset,
      preMarketSummary: null,
      planSummary: null,
      postMarketSummary: null,
      dayResult: null,
    };
    this.analysisRows.set(analysis.id, analysis);
    return analysis;
  }

  attachTradeNote(tradeId: number, noteId: number): void {
    this.tradeNoteLinks.push({ ownerId: tradeId, childId: noteId });
  }
}
