import crypto from 'crypto';
import { createClient, SupabaseClient } from '@supabase/supabase-js';
import type {
  Document,
  ExtractedTriple,
  ExtractionJob,
  ExtractionMode,
  InsertTriple,
  JobStatus,
  TripleStatus,
} from '../extraction/types';
import type { TripleEdits } from '../extraction/schemas';

export interface InsertDocument {
  project_id?: number | null;
  file_path: string;
  text_content: string;
  doi?: string | null;
  doi_hash?: string | null;
}

export interface InsertJob {
  project_id: number | null;
  document_ids: number[];
  model_profile: string;
  mode: ExtractionMode;
  created_by: string | null;
}

export type JobPatch = Partial<
  Pick<ExtractionJob, 'status' | 'progress' | 'error_message' | 'results' | 'started_at' | 'completed_at'>
>;

export interface PageParams {
  page?: number;
  limit?: number;
}

export interface PageResult<T> {
  data: T[];
  count: number;
}

export interface DocumentFilters {
  project_id?: number;
}

export interface JobFilters {
  project_id?: number;
  status?: JobStatus;
}

export interface TripleFilters {
  job_id?: number;
  document_id?: number;
  project_id?: number;
  status?: TripleStatus;
  min_confidence?: number;
}

export interface TripleUpdate {
  status: TripleStatus;
  edits?: TripleEdits;
}

export interface DocumentStore {
  getDocument(documentId: number): Promise<Document | null>;
  createDocument(document: InsertDocument): Promise<Document>;
  listDocuments(filters: DocumentFilters, page: PageParams): Promise<PageResult<Document>>;
}

export interface JobStore {
  createJob(job: InsertJob): Promise<ExtractionJob>;
  getJob(jobId: number): Promise<ExtractionJob | null>;
  /**
   * Applies `patch` to the job. With `expectedStatus`, the update only happens
   * while the job is still in that status; `null` means it was not applied.
   */
  updateJob(jobId: number, patch: JobPatch, expectedStatus?: JobStatus): Promise<ExtractionJob | null>;
  listJobs(filters: JobFilters, page: PageParams): Promise<PageResult<ExtractionJob>>;
}

export interface TripleStore {
  /** Creates a sentence row for every triple lacking `sentence_id`. Returns the number inserted. */
  insertTriples(triples: InsertTriple[]): Promise<number>;
  listTriples(filters: TripleFilters, page: PageParams): Promise<PageResult<ExtractedTriple>>;
  updateTriple(tripleId: number, update: TripleUpdate): Promise<ExtractedTriple | null>;
}

export type TraitStore = DocumentStore & JobStore & TripleStore;

export const DEFAULT_PAGE_SIZE = 50;
export const MAX_PAGE_SIZE = 100;

export function pageRange(params: PageParams): { page: number; limit: number; offset: number } {
  const page = Math.max(params.page || 1, 1);
  const limit = Math.min(Math.max(params.limit || DEFAULT_PAGE_SIZE, 1), MAX_PAGE_SIZE);
  return { page, limit, offset: (page - 1) * limit };
}

/** Short content hash used to key documents and sentences by DOI. */
export function doiHash(doi: string): string {
  return crypto.createHash('sha256').update(doi, 'utf8').digest('hex').slice(0, 16);
}

const JOB_SELECT = '*, trait_extraction_job_documents(document_id, position)';
const TRIPLE_SELECT = '*, sentences(text)';

type JobRow = Omit<ExtractionJob, 'document_ids'> & {
  trait_extraction_job_documents: Array<{ document_id: number; position: number }> | null;
};

type TripleRow = Omit<ExtractedTriple, 'sentence'> & {
  sentences: { text: string } | null;
};

export function toJob(row: JobRow): ExtractionJob {
  const { trait_extraction_job_documents: members, ...job } = row;
  const document_ids = [...(members || [])]
    .sort((a, b) => a.position - b.position)
    .map((member) => member.document_id);
  return { ...job, document_ids };
}

export function toTriple(row: TripleRow): ExtractedTriple {
  const { sentences, ...triple } = row;
  return { ...triple, sentence: sentences?.text ?? '' };
}

export class SupabaseTraitStore implements TraitStore {
  public client: SupabaseClient;

  constructor(url: string, serviceRoleKey: string) {
    this.client = createClient(url, serviceRoleKey);
  }

  async getDocument(documentId: number): Promise<Document | null> {
    const { data, error } = await this.client
      .from('trait_documents')
      .select('*')
      .eq('id', documentId)
      .maybeSingle();

    if (error) {
      throw new Error(`Failed to get document: ${error.message}`);
    }

    return data as Document | null;
  }

  async createDocument(document: InsertDocument): Promise<Document> {
    const doi = document.doi || null;
    const { data, error } = await this.client
      .from('trait_documents')
      .insert({
        project_id: document.project_id ?? null,
        file_path: document.file_path,
        text_content: document.text_content,
        doi,
        doi_hash: document.doi_hash ?? (doi ? doiHash(doi) : null),
        status: 'pending',
      })
      .select()
      .single();

    if (error) {
      throw new Error(`Failed to insert document: ${error.message}`);
    }

    return data as Document;
  }

  async listDocuments(filters: DocumentFilters, params: PageParams): Promise<PageResult<Document>> {
    const { offset, limit } = pageRange(params);
    let query = this.client.from('trait_documents').select('*', { count: 'exact' });
    if (filters.project_id !== undefined) {
      query = query.eq('project_id', filters.project_id);
    }

    const { data, error, count } = await query
      .order('created_at', { ascending: false })
      .range(offset, offset + limit - 1);

    if (error) {
      throw new Error(`Failed to list documents: ${error.message}`);
    }

    return { data: (data || []) as Document[], count: count || 0 };
  }

  async createJob(job: InsertJob): Promise<ExtractionJob> {
    const { data, error } = await this.client
      .from('trait_extraction_jobs')
      .insert({
        project_id: job.project_id,
        model_profile: job.model_profile,
        mode: job.mode,
        status: 'pending',
        progress: 0,
        total: job.document_ids.length,
        created_by: job.created_by,
      })
      .select('id')
      .single();

    if (error) {
      throw new Error(`Failed to insert extraction job: ${error.message}`);
    }

    const jobId = (data as { id: number }).id;
    if (job.document_ids.length > 0) {
      const { error: membersError } = await this.client
        .from('trait_extraction_job_documents')
        .insert(
          job.document_ids.map((document_id, position) => ({ job_id: jobId, document_id, position }))
        );

      if (membersError) {
        await this.client.from('trait_extraction_jobs').delete().eq('id', jobId);
        throw new Error(`Failed to insert job documents: ${membersError.message}`);
      }
    }

    const created = await this.getJob(jobId);
    if (!created) {
      throw new Error(`Extraction job ${jobId} disappeared after insert`);
    }
    return created;
  }

  async getJob(jobId: number): Promise<ExtractionJob | null> {
    const { data, error } = await this.client
      .from('trait_extraction_jobs')
      .select(JOB_SELECT)
      .eq('id', jobId)
      .maybeSingle();

    if (error) {
      throw new Error(`Failed to get extraction job: ${error.message}`);
    }

    return data ? toJob(data as JobRow) : null;
  }

  async updateJob(
    jobId: number,
    patch: JobPatch,
    expectedStatus?: JobStatus
  ): Promise<ExtractionJob | null> {
    let query = this.client.from('trait_extraction_jobs').update(patch).eq('id', jobId);
    if (expectedStatus) {
      query = query.eq('status', expectedStatus);
    }

    const { data, error } = await query.select(JOB_SELECT).maybeSingle();

    if (error) {
      throw new Error(`Failed to update extraction job: ${error.message}`);
    }

    return data ? toJob(data as JobRow) : null;
  }

  async listJobs(filters: JobFilters, params: PageParams): Promise<PageResult<ExtractionJob>> {
    const { offset, limit } = pageRange(params);
    let query = this.client.from('trait_extraction_jobs').select(JOB_SELECT, { count: 'exact' });
    if (filters.project_id !== undefined) {
      query = query.eq('project_id', filters.project_id);
    }
    if (filters.status) {
      query = query.eq('status', filters.status);
    }

    const { data, error, count } = await query
      .order('created_at', { ascending: false })
      .range(offset, offset + limit - 1);

    if (error) {
      throw new Error(`Failed to list extraction jobs: ${error.message}`);
    }

    return { data: ((data || []) as JobRow[]).map(toJob), count: count || 0 };
  }

  async insertTriples(triples: InsertTriple[]): Promise<number> {
    if (triples.length === 0) {
      return 0;
    }

    const needSentence = triples.filter((triple) => !triple.sentence_id);
    const sentenceIds: number[] = [];
    if (needSentence.length > 0) {
      const { data, error } = await this.client
        .from('sentences')
        .insert(
          needSentence.map((triple) => ({
            text: triple.sentence,
            literature_link: '',
            doi_hash: triple.doi_hash,
          }))
        )
        .select('id');

      if (error) {
        throw new Error(`Failed to insert sentences: ${error.message}`);
      }
      sentenceIds.push(...((data || []) as Array<{ id: number }>).map((row) => row.id));
      if (sentenceIds.length !== needSentence.length) {
        throw new Error(
          `Inserted ${sentenceIds.length} sentences for ${needSentence.length} triples`
        );
      }
    }

    let next = 0;
    const rows = triples.map(({ sentence: _sentence, ...triple }) => ({
      ...triple,
      sentence_id: triple.sentence_id || sentenceIds[next++],
    }));

    const { error } = await this.client.from('triples').insert(rows);

    if (error) {
      if (sentenceIds.length > 0) {
        await this.client.from('sentences').delete().in('id', sentenceIds);
      }
      throw new Error(`Failed to insert triples: ${error.message}`);
    }

    return rows.length;
  }

  async listTriples(filters: TripleFilters, params: PageParams): Promise<PageResult<ExtractedTriple>> {
    const { offset, limit } = pageRange(params);
    let query = this.client
      .from('triples')
      .select(TRIPLE_SELECT, { count: 'exact' })
      .gte('confidence', filters.min_confidence ?? 0);
    if (filters.job_id !== undefined) query = query.eq('job_id', filters.job_id);
    if (filters.document_id !== undefined) query = query.eq('document_id', filters.document_id);
    if (filters.project_id !== undefined) query = query.eq('project_id', filters.project_id);
    if (filters.status) query = query.eq('status', filters.status);

    const { data, error, count } = await query
      .order('confidence', { ascending: false })
      .order('created_at', { ascending: false })
      .range(offset, offset + limit - 1);

    if (error) {
      throw new Error(`Failed to list triples: ${error.message}`);
    }

    return { data: ((data || []) as TripleRow[]).map(toTriple), count: count || 0 };
  }

  async updateTriple(tripleId: number, update: TripleUpdate): Promise<ExtractedTriple | null> {
    const { data, error } = await this.client
      .from('triples')
      .update({ ...update.edits, status: update.status, updated_at: new Date().toISOString() })
      .eq('id', tripleId)
      .select(TRIPLE_SELECT)
      .maybeSingle();

    if (error) {
      throw new Error(`Failed to update triple: ${error.message}`);
    }

    return data ? toTriple(data as TripleRow) : null;
  }
}

export function createTraitStore(): SupabaseTraitStore {
  const url = process.env.SUPABASE_URL;
  const serviceRoleKey = process.env.SUPABASE_SERVICE_ROLE_KEY;

  if (!url || !serviceRoleKey) {
    throw new Error(
      'Missing SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY environment variables'
    );
  }

  return new SupabaseTraitStore(url, serviceRoleKey);
}
