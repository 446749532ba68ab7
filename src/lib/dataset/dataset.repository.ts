/**
 * Dataset Repository
 * Loads the canonical JSON files and writes them back atomically
 */

import * as path from 'path';
import { PersistenceError, ScrapingErrorType } from '../scraping/errors';
import { JsonFileStorage } from '../storage';
import { ContactCandidate, ContactJson, Dataset, ListingRecord, ProjectJson, emptyDataset } from './dataset.types';
import { buildWinnerEmails, buildWinnersTable } from './winners-table';

export const DATASET_FILES = {
  projects: 'projects.json',
  contacts: 'contacts.json',
  winnerEmails: 'winner_emails.json',
  winnersTable: 'winners_table.json',
} as const;

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function stringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

// ============================================================================
// Serialization
// ============================================================================

export function toProjectJson(record: ListingRecord): ProjectJson {
  const json: ProjectJson = {
    id: record.id,
    year: record.year,
    title: record.title,
    category: record.category,
    awards: [...record.awards],
    abstract_url: record.abstractUrl,
  };
  if (record.booth !== undefined) json.booth = record.booth;
  if (record.country !== undefined) json.country = record.country;
  if (record.studentName !== undefined) json.student_name = record.studentName;
  if (record.abstract !== undefined) json.abstract = record.abstract;
  if (record.categories !== undefined) json.categories = [...record.categories];
  if (record.skills !== undefined) json.skills = [...record.skills];
  return json;
}

export function fromProjectJson(value: unknown): ListingRecord | null {
  if (!isRecord(value) || typeof value.id !== 'number' || typeof value.title !== 'string') {
    return null;
  }

  const record: ListingRecord = {
    id: value.id,
    // older files stored the year as a number
    year: typeof value.year === 'number' ? String(value.year) : optionalString(value.year),
    title: value.title,
    category: optionalString(value.category),
    awards: stringArray(value.awards),
    abstractUrl: optionalString(value.abstract_url) ?? '',
  };
  if ('booth' in value) record.booth = optionalString(value.booth);
  if ('country' in value) record.country = optionalString(value.country);
  if ('student_name' in value) record.studentName = optionalString(value.student_name);
  if ('abstract' in value) record.abstract = optionalString(value.abstract);
  if ('categories' in value) record.categories = stringArray(value.categories);
  if ('skills' in value) record.skills = stringArray(value.skills);
  return record;
}

export function toContactJson(candidate: ContactCandidate): ContactJson {
  const json: ContactJson = { owner_id: candidate.ownerId, name: candidate.name, source_query: candidate.sourceQuery };
  if (candidate.email !== undefined) json.email = candidate.email;
  if (candidate.linkedinUrl !== undefined) json.linkedin_url = candidate.linkedinUrl;
  return json;
}

export function fromContactJson(value: unknown): ContactCandidate | null {
  if (
    !isRecord(value) ||
    typeof value.owner_id !== 'number' ||
    typeof value.name !== 'string' ||
    typeof value.source_query !== 'string'
  ) {
    return null;
  }

  const candidate: ContactCandidate = { ownerId: value.owner_id, name: value.name, sourceQuery: value.source_query };
  if (typeof value.email === 'string') candidate.email = value.email;
  if (typeof value.linkedin_url === 'string') candidate.linkedinUrl = value.linkedin_url;
  return candidate;
}

// ============================================================================
// Repository
// ============================================================================

export class DatasetRepository {
  constructor(
    private readonly dataDir: string,
    private readonly storage: JsonFileStorage = new JsonFileStorage()
  ) {}

  filePath(name: keyof typeof DATASET_FILES): string {
    return path.join(this.dataDir, DATASET_FILES[name]);
  }

  /**
   * Missing files load as empty. An unreadable file is an error: the next
   * write would otherwise replace it with a near-empty dataset.
   */
  async load(): Promise<Dataset> {
    const dataset = emptyDataset();

    for (const record of await this.readArray('projects', fromProjectJson)) {
      dataset.listings.set(record.id, record);
    }

    for (const candidate of await this.readArray('contacts', fromContactJson)) {
      const ownerCandidates = dataset.contacts.get(candidate.ownerId) ?? [];
      ownerCandidates.push(candidate);
      dataset.contacts.set(candidate.ownerId, ownerCandidates);
    }

    return dataset;
  }

  async saveListings(dataset: Dataset): Promise<void> {
    const projects = [...dataset.listings.values()].sort((a, b) => a.id - b.id).map(toProjectJson);
    await this.storage.write(this.filePath('projects'), projects);
  }

  /**
   * Writes the candidate set and the two views derived from it
   */
  async saveContacts(dataset: Dataset): Promise<void> {
    const ownerIds = [...dataset.contacts.keys()].sort((a, b) => a - b);
    const contacts = ownerIds.flatMap((ownerId) => (dataset.contacts.get(ownerId) ?? []).map(toContactJson));

    await this.storage.write(this.filePath('contacts'), contacts);
    await this.storage.write(this.filePath('winnerEmails'), buildWinnerEmails(dataset));
    await this.storage.write(this.filePath('winnersTable'), buildWinnersTable(dataset));
  }

  private async readArray<T>(name: keyof typeof DATASET_FILES, convert: (value: unknown) => T | null): Promise<T[]> {
    const filePath = this.filePath(name);
    const result = await this.storage.read(filePath);

    if (result.status === 'missing') {
      return [];
    }
    if (result.status === 'invalid') {
      throw new PersistenceError(ScrapingErrorType.CORRUPT_DATASET, filePath, `Cannot read ${filePath}: ${result.reason}`);
    }
    const values = result.value;
    if (!Array.isArray(values)) {
      throw new PersistenceError(ScrapingErrorType.CORRUPT_DATASET, filePath, `Cannot read ${filePath}: expected a JSON array`);
    }

    const items: T[] = [];
    let skipped = 0;
    for (const value of values) {
      const item = convert(value);
      if (item === null) {
        skipped++;
      } else {
        items.push(item);
      }
    }
    if (skipped > 0) {
      console.warn(`[DatasetRepository] Skipped ${skipped} malformed entries in ${filePath}`);
    }
    return items;
  }
}
