import Database from 'better-sqlite3';
import type {
    CitationEdge,
    EdgeRoleAnnotation,
    EnrichedPaper,
    Paper,
    RunRecord,
    StageName,
    StageRecord,
    TallyRecord,
} from '../types/index.js';
import { EdgeRole, isEdgeRole } from '../types/index.js';
import { MissingPrerequisiteError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 * One table per pipeline stage output, plus stage bookkeeping and run history.
 */
const MIGRATION_V1 = `
-- Runs: one row per \`run\` invocation
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  rolegraph_version TEXT NOT NULL,
  collection TEXT NOT NULL,
  config_json TEXT NOT NULL,
  stats_json TEXT NOT NULL DEFAULT '{}'
);

-- Stages: last completion of each stage
CREATE TABLE IF NOT EXISTS stages (
  name TEXT PRIMARY KEY,
  completed_at TEXT NOT NULL,
  rows_in INTEGER NOT NULL,
  rows_out INTEGER NOT NULL
);

-- Collection: canonical DOIs from the reference export
CREATE TABLE IF NOT EXISTS collection_dois (
  doi TEXT PRIMARY KEY
);

-- Papers: one per OpenAlex work id
CREATE TABLE IF NOT EXISTS papers (
  work_id TEXT PRIMARY KEY,
  doi TEXT,
  title TEXT NOT NULL,
  year INTEGER,
  in_collection INTEGER NOT NULL DEFAULT 1
);

-- Citation edges as referenced by the work documents
CREATE TABLE IF NOT EXISTS edges_raw (
  citing_id TEXT NOT NULL,
  cited_id TEXT NOT NULL,
  PRIMARY KEY (citing_id, cited_id)
);

-- Edges whose citing work is in the collection
CREATE TABLE IF NOT EXISTS edges_scoped (
  citing_id TEXT NOT NULL,
  cited_id TEXT NOT NULL,
  PRIMARY KEY (citing_id, cited_id)
);

-- Tallies keyed by the DOI they were fetched for
CREATE TABLE IF NOT EXISTS tallies (
  position INTEGER PRIMARY KEY,
  doi TEXT NOT NULL,
  supporting INTEGER NOT NULL DEFAULT 0,
  contradicting INTEGER NOT NULL DEFAULT 0,
  mentioning INTEGER NOT NULL DEFAULT 0,
  unclassified INTEGER NOT NULL DEFAULT 0,
  total INTEGER NOT NULL DEFAULT 0,
  citing_publications INTEGER NOT NULL DEFAULT 0
);

-- Papers with tallies attached
CREATE TABLE IF NOT EXISTS papers_enriched (
  work_id TEXT PRIMARY KEY,
  doi TEXT,
  title TEXT NOT NULL,
  year INTEGER,
  in_collection INTEGER NOT NULL DEFAULT 1,
  supporting INTEGER NOT NULL DEFAULT 0,
  contradicting INTEGER NOT NULL DEFAULT 0,
  mentioning INTEGER NOT NULL DEFAULT 0,
  unclassified INTEGER NOT NULL DEFAULT 0,
  total INTEGER NOT NULL DEFAULT 0,
  citing_publications INTEGER NOT NULL DEFAULT 0
);

-- Edge role annotations, at most one per ordered pair
CREATE TABLE IF NOT EXISTS edge_roles (
  citing_id TEXT NOT NULL,
  cited_id TEXT NOT NULL,
  role TEXT NOT NULL,
  confidence REAL NOT NULL,
  reason TEXT NOT NULL DEFAULT '',
  PRIMARY KEY (citing_id, cited_id)
);

CREATE INDEX IF NOT EXISTS idx_papers_doi ON papers(doi);
CREATE INDEX IF NOT EXISTS idx_papers_enriched_doi ON papers_enriched(doi);
CREATE INDEX IF NOT EXISTS idx_edge_roles_role ON edge_roles(role);
`;

/**
 * Tables a stage writes and `export` can dump.
 */
export const DATA_TABLES = [
    'collection_dois',
    'papers',
    'edges_raw',
    'edges_scoped',
    'tallies',
    'papers_enriched',
    'edge_roles',
] as const;

export type DataTable = (typeof DATA_TABLES)[number];

export function isDataTable(value: string): value is DataTable {
    return DATA_TABLES.some((table) => table === value);
}

type TableRow = Record<string, unknown>;

interface PaperRow {
    work_id: string;
    doi: string | null;
    title: string;
    year: number | null;
    in_collection: number;
}

type EnrichedPaperRow = PaperRow & Omit<TallyRecord, 'doi'>;

interface EdgeRoleRow extends CitationEdge {
    role: string;
    confidence: number;
    reason: string;
}

function toPaper(row: PaperRow): Paper {
    return {
        work_id: row.work_id,
        doi: row.doi,
        title: row.title,
        year: row.year,
        in_collection: row.in_collection !== 0,
    };
}

/**
 * Pipeline state database wrapper around better-sqlite3.
 * Handles schema migration, WAL mode, and whole-table replacement per stage.
 */
export class PipelineDatabase {
    private db: Database.Database;

    constructor(readonly dbPath: string) {
        this.db = new Database(dbPath);

        this.db.pragma('journal_mode = WAL');

        this.migrate();

        getLogger().debug({ dbPath }, 'Database initialized');
    }

    private migrate(): void {
        const currentVersion = Number(this.db.pragma('user_version', { simple: true }));

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().debug('Database migrated to v1');
        }
    }

    // ─── Collection ───────────────────────────────────────────

    replaceCollectionDois(dois: readonly string[]): void {
        const stmt = this.db.prepare<[string]>('INSERT OR IGNORE INTO collection_dois (doi) VALUES (?)');
        this.replaceTable('collection_dois', () => {
            for (const doi of dois) stmt.run(doi);
        });
    }

    getCollectionDois(): string[] {
        return this.db
            .prepare<[], { doi: string }>('SELECT doi FROM collection_dois ORDER BY rowid')
            .all()
            .map((row) => row.doi);
    }

    // ─── Papers ───────────────────────────────────────────────

    replacePapers(papers: readonly Paper[]): void {
        const stmt = this.db.prepare<[PaperRow]>(`
      INSERT INTO papers (work_id, doi, title, year, in_collection)
      VALUES (@work_id, @doi, @title, @year, @in_collection)
    `);
        this.replaceTable('papers', () => {
            for (const paper of papers) {
                stmt.run({ ...paper, in_collection: paper.in_collection ? 1 : 0 });
            }
        });
    }

    getPapers(): Paper[] {
        return this.db
            .prepare<[], PaperRow>('SELECT work_id, doi, title, year, in_collection FROM papers ORDER BY rowid')
            .all()
            .map(toPaper);
    }

    replaceEnrichedPapers(papers: readonly EnrichedPaper[]): void {
        const stmt = this.db.prepare<[EnrichedPaperRow]>(`
      INSERT INTO papers_enriched (work_id, doi, title, year, in_collection,
        supporting, contradicting, mentioning, unclassified, total, citing_publications)
      VALUES (@work_id, @doi, @title, @year, @in_collection,
        @supporting, @contradicting, @mentioning, @unclassified, @total, @citing_publications)
    `);
        this.replaceTable('papers_enriched', () => {
            for (const paper of papers) {
                stmt.run({ ...paper, in_collection: paper.in_collection ? 1 : 0 });
            }
        });
    }

    getEnrichedPapers(): EnrichedPaper[] {
        return this.db
            .prepare<[], EnrichedPaperRow>('SELECT * FROM papers_enriched ORDER BY rowid')
            .all()
            .map((row) => ({
                ...toPaper(row),
                supporting: row.supporting,
                contradicting: row.contradicting,
                mentioning: row.mentioning,
                unclassified: row.unclassified,
                total: row.total,
                citing_publications: row.citing_publications,
            }));
    }

    // ─── Edges ────────────────────────────────────────────────

    replaceRawEdges(edges: readonly CitationEdge[]): void {
        this.replaceEdges('edges_raw', edges);
    }

    getRawEdges(): CitationEdge[] {
        return this.getEdges('edges_raw');
    }

    replaceScopedEdges(edges: readonly CitationEdge[]): void {
        this.replaceEdges('edges_scoped', edges);
    }

    getScopedEdges(): CitationEdge[] {
        return this.getEdges('edges_scoped');
    }

    private replaceEdges(table: 'edges_raw' | 'edges_scoped', edges: readonly CitationEdge[]): void {
        const stmt = this.db.prepare<[CitationEdge]>(
            `INSERT OR IGNORE INTO ${table} (citing_id, cited_id) VALUES (@citing_id, @cited_id)`
        );
        this.replaceTable(table, () => {
            for (const edge of edges) stmt.run(edge);
        });
    }

    private getEdges(table: 'edges_raw' | 'edges_scoped'): CitationEdge[] {
        return this.db
            .prepare<[], CitationEdge>(`SELECT citing_id, cited_id FROM ${table} ORDER BY rowid`)
            .all();
    }

    // ─── Tallies ──────────────────────────────────────────────

    replaceTallies(tallies: readonly TallyRecord[]): void {
        const stmt = this.db.prepare<[TallyRecord]>(`
      INSERT INTO tallies (doi, supporting, contradicting, mentioning, unclassified, total, citing_publications)
      VALUES (@doi, @supporting, @contradicting, @mentioning, @unclassified, @total, @citing_publications)
    `);
        this.replaceTable('tallies', () => {
            for (const tally of tallies) stmt.run(tally);
        });
    }

    getTallies(): TallyRecord[] {
        return this.db
            .prepare<[], TallyRecord>(
                `SELECT doi, supporting, contradicting, mentioning, unclassified, total, citing_publications
         FROM tallies ORDER BY position`
            )
            .all();
    }

    // ─── Edge roles ───────────────────────────────────────────

    replaceEdgeRoles(annotations: readonly EdgeRoleAnnotation[]): void {
        const stmt = this.db.prepare<[EdgeRoleRow]>(`
      INSERT OR REPLACE INTO edge_roles (citing_id, cited_id, role, confidence, reason)
      VALUES (@citing_id, @cited_id, @role, @confidence, @reason)
    `);
        this.replaceTable('edge_roles', () => {
            for (const annotation of annotations) stmt.run(annotation);
        });
    }

    getEdgeRoles(): EdgeRoleAnnotation[] {
        return this.db
            .prepare<[], EdgeRoleRow>('SELECT citing_id, cited_id, role, confidence, reason FROM edge_roles ORDER BY rowid')
            .all()
            .map((row) => ({
                ...row,
                role: isEdgeRole(row.role) ? row.role : EdgeRole.BACKGROUND,
            }));
    }

    // ─── Stages ───────────────────────────────────────────────

    markStageComplete(name: StageName, rowsIn: number, rowsOut: number): void {
        this.db
            .prepare<[StageRecord]>(`
      INSERT OR REPLACE INTO stages (name, completed_at, rows_in, rows_out)
      VALUES (@name, @completed_at, @rows_in, @rows_out)
    `)
            .run({ name, completed_at: new Date().toISOString(), rows_in: rowsIn, rows_out: rowsOut });
    }

    getStage(name: StageName): StageRecord | undefined {
        return this.db
            .prepare<[string], StageRecord>('SELECT name, completed_at, rows_in, rows_out FROM stages WHERE name = ?')
            .get(name);
    }

    getStages(): StageRecord[] {
        return this.db
            .prepare<[], StageRecord>('SELECT name, completed_at, rows_in, rows_out FROM stages ORDER BY completed_at')
            .all();
    }

    /**
     * Throw MissingPrerequisiteError unless `producer` has completed,
     * naming the table the requesting stage needs.
     */
    requireStage(producer: StageName, table: DataTable, requestedBy: StageName): void {
        if (!this.getStage(producer)) {
            throw new MissingPrerequisiteError(`${this.dbPath}#${table}`, requestedBy);
        }
    }

    // ─── Runs ─────────────────────────────────────────────────

    insertRun(run: Omit<RunRecord, 'run_id'>): number {
        const stmt = this.db.prepare<[Omit<RunRecord, 'run_id'>]>(`
      INSERT INTO runs (created_at, rolegraph_version, collection, config_json, stats_json)
      VALUES (@created_at, @rolegraph_version, @collection, @config_json, @stats_json)
    `);
        const result = stmt.run(run);
        return Number(result.lastInsertRowid);
    }

    getRuns(): RunRecord[] {
        return this.db.prepare<[], RunRecord>('SELECT * FROM runs ORDER BY run_id').all();
    }

    // ─── Stats ────────────────────────────────────────────────

    countRows(table: DataTable | 'runs' | 'stages'): number {
        const row = this.db.prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM ${table}`).get();
        return row?.count ?? 0;
    }

    getStats(): Record<DataTable | 'runs', number> {
        return {
            collection_dois: this.countRows('collection_dois'),
            papers: this.countRows('papers'),
            edges_raw: this.countRows('edges_raw'),
            edges_scoped: this.countRows('edges_scoped'),
            tallies: this.countRows('tallies'),
            papers_enriched: this.countRows('papers_enriched'),
            edge_roles: this.countRows('edge_roles'),
            runs: this.countRows('runs'),
        };
    }

    /**
     * All rows of a data table in insertion order, for export.
     */
    tableRows(table: DataTable): TableRow[] {
        return this.db.prepare<[], TableRow>(`SELECT * FROM ${table} ORDER BY rowid`).all();
    }

    tableColumns(table: DataTable): string[] {
        return this.db
            .prepare<[], { name: string }>(`PRAGMA table_info(${table})`)
            .all()
            .map((column) => column.name);
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Execute a function within a transaction.
     */
    transaction<T>(fn: () => T): T {
        return this.db.transaction(fn)();
    }

    close(): void {
        this.db.close();
        getLogger().debug('Database closed');
    }

    private replaceTable(table: DataTable, insertRows: () => void): void {
        this.transaction(() => {
            this.db.exec(`DELETE FROM ${table}`);
            insertRows();
        });
    }
}
