/**
 * Workshop Content Index
 *
 * A catalog of workshop document titles sorted into labs, setup guides,
 * security topics and tools. The titles are the only content: relevance is a
 * keyword match against them, used to ground chat prompts.
 */

import { existsSync, readdirSync, readFileSync } from 'fs';
import { basename, extname, join } from 'path';
import { ERROR_CODES } from '../errors/codes';
import { WorkshopError } from '../errors/types';
import type { AppLogger } from '../monitoring/logger';
import { isRecord } from '../utils/validation';

export type ContentCategory = 'labs' | 'setupGuides' | 'securityTopics' | 'toolsAndServices';

export interface WorkshopCatalog {
  workshopTitle: string;
  documents: string[];
}

export const DEFAULT_WORKSHOP_TITLE = 'Configuring Amazon S3 Security Settings and Access Controls';

export const DEFAULT_CATALOG_PATH = join(__dirname, '../../workshop-content/catalog.json');

interface CategoryRule {
  category: ContentCategory;
  matches: (title: string) => boolean;
}

const containsAny =
  (words: readonly string[]) =>
  (title: string): boolean =>
    words.some((word) => title.includes(word));

/**
 * First matching rule wins; titles no rule claims are security topics.
 */
const CATEGORY_RULES: readonly CategoryRule[] = [
  { category: 'labs', matches: (title) => title.startsWith('Lab ') },
  { category: 'setupGuides', matches: containsAny(['Setup', 'Prepare', 'Initial']) },
  {
    category: 'securityTopics',
    matches: containsAny(['Security', 'Access', 'Block', 'Encrypt', 'HTTPS']),
  },
  {
    category: 'toolsAndServices',
    matches: containsAny(['Athena', 'CloudTrail', 'GuardDuty', 'Config']),
  },
];

export function categorizeTitle(title: string): ContentCategory {
  const rule = CATEGORY_RULES.find((candidate) => candidate.matches(title));
  return rule ? rule.category : 'securityTopics';
}

/**
 * Relevance lookups in this order, with the prefix each match is reported under
 */
const RELEVANCE_SECTIONS: ReadonlyArray<{ category: ContentCategory; prefix: string }> = [
  { category: 'labs', prefix: 'Lab' },
  { category: 'securityTopics', prefix: 'Topic' },
  { category: 'toolsAndServices', prefix: 'Tool' },
];

export class WorkshopContentIndex {
  readonly workshopTitle: string;
  private readonly sections: Record<ContentCategory, string[]>;
  private readonly relatedMaterials: Record<string, string[]>;

  constructor(catalog: WorkshopCatalog, relatedMaterials: Record<string, string[]> = {}) {
    this.workshopTitle = catalog.workshopTitle;
    this.relatedMaterials = relatedMaterials;
    this.sections = {
      labs: [],
      setupGuides: [],
      securityTopics: [],
      toolsAndServices: [],
    };

    for (const title of catalog.documents) {
      this.sections[categorizeTitle(title)].push(title);
    }
  }

  getSection(category: ContentCategory): readonly string[] {
    return this.sections[category];
  }

  get documentCount(): number {
    return Object.values(this.sections).reduce((sum, titles) => sum + titles.length, 0);
  }

  /**
   * Formatted overview of the whole workshop for prompts
   */
  getWorkshopContext(): string {
    const list = (titles: readonly string[]) => titles.map((title) => `- ${title}`).join('\n');

    return [
      `Workshop: ${this.workshopTitle}`,
      '',
      'Available Labs:',
      list(this.sections.labs),
      '',
      'Setup Guides:',
      list(this.sections.setupGuides),
      '',
      'Security Topics Covered:',
      list(this.sections.securityTopics),
      '',
      'AWS Services & Tools:',
      list(this.sections.toolsAndServices),
    ]
      .join('\n')
      .trim();
  }

  /**
   * Titles sharing a word with the query. A title matches when any query word
   * appears in it, case-insensitively.
   */
  getRelevantContent(query: string): string[] {
    const keywords = query.toLowerCase().split(/\s+/).filter((word) => word.length > 0);
    if (keywords.length === 0) {
      return [];
    }

    const relevant: string[] = [];
    for (const { category, prefix } of RELEVANCE_SECTIONS) {
      for (const title of this.sections[category]) {
        const lowerTitle = title.toLowerCase();
        if (keywords.some((keyword) => lowerTitle.includes(keyword))) {
          relevant.push(`${prefix}: ${title}`);
        }
      }
    }
    return relevant;
  }

  getTroubleshootingContext(issueType: string): string[] {
    return this.relatedMaterials[issueType] ?? [];
  }
}

export function parseWorkshopCatalog(value: unknown): WorkshopCatalog {
  if (
    !isRecord(value) ||
    typeof value.workshopTitle !== 'string' ||
    !Array.isArray(value.documents) ||
    !value.documents.every((document): document is string => typeof document === 'string')
  ) {
    throw new WorkshopError(
      ERROR_CODES.CONTENT_INVALID,
      'Invalid workshop catalog: expected workshopTitle and a list of document titles'
    );
  }
  return { workshopTitle: value.workshopTitle, documents: value.documents };
}

export function loadCatalogFile(filePath: string = DEFAULT_CATALOG_PATH): WorkshopCatalog {
  return parseWorkshopCatalog(JSON.parse(readFileSync(filePath, 'utf-8')));
}

/**
 * Document titles are the PDF file names of the directory, without extension
 */
export function loadCatalogDirectory(directory: string, workshopTitle: string): WorkshopCatalog {
  const documents = readdirSync(directory)
    .filter((fileName) => extname(fileName).toLowerCase() === '.pdf')
    .sort()
    .map((fileName) => basename(fileName, extname(fileName)));

  return { workshopTitle, documents };
}

export interface WorkshopContentOptions {
  contentDirectory?: string;
  workshopTitle?: string;
  catalogPath?: string;
  relatedMaterials?: Record<string, string[]>;
}

/**
 * Build the index from the configured PDF directory, or from the bundled
 * catalog when no directory is configured or it does not exist.
 */
export function loadWorkshopContent(
  options: WorkshopContentOptions,
  logger: AppLogger
): WorkshopContentIndex {
  const { contentDirectory, workshopTitle, catalogPath, relatedMaterials } = options;

  let catalog: WorkshopCatalog;
  if (contentDirectory && existsSync(contentDirectory)) {
    catalog = loadCatalogDirectory(contentDirectory, workshopTitle ?? DEFAULT_WORKSHOP_TITLE);
    logger.info('Workshop content loaded from directory', {
      event: 'workshop_content_loaded',
      contentDirectory,
      documents: catalog.documents.length,
    });
  } else {
    if (contentDirectory) {
      logger.warn('Workshop content directory not found, using bundled catalog', {
        event: 'workshop_content_directory_missing',
        contentDirectory,
      });
    }
    const bundled = loadCatalogFile(catalogPath);
    catalog = {
      workshopTitle: workshopTitle ?? bundled.workshopTitle,
      documents: bundled.documents,
    };
    logger.info('Workshop content loaded from catalog', {
      event: 'workshop_content_loaded',
      documents: catalog.documents.length,
    });
  }

  return new WorkshopContentIndex(catalog, relatedMaterials);
}
