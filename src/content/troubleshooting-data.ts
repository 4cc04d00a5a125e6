/**
 * Loader for workshop-content/troubleshooting.json
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { ERROR_CODES } from '../errors/codes';
import { WorkshopError } from '../errors/types';

export interface IssueGuide {
  steps: string[];
  commonCauses: string[];
  escalationThreshold: number;
}

export interface TroubleshootingData {
  guides: Record<string, IssueGuide>;
  defaultGuide: IssueGuide;
  nextActions: string[];
  /** Workshop documents worth reading for an issue type */
  relatedMaterials: Record<string, string[]>;
}

export const DEFAULT_TROUBLESHOOTING_PATH = join(
  __dirname,
  '../../workshop-content/troubleshooting.json'
);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === 'string');
}

function invalid(message: string): WorkshopError {
  return new WorkshopError(ERROR_CODES.CONTENT_INVALID, `Invalid troubleshooting data: ${message}`);
}

function parseGuide(value: unknown, name: string): IssueGuide {
  if (
    !isRecord(value) ||
    !isStringArray(value.steps) ||
    !isStringArray(value.commonCauses) ||
    typeof value.escalationThreshold !== 'number'
  ) {
    throw invalid(`guide "${name}" needs steps, commonCauses and escalationThreshold`);
  }
  return {
    steps: value.steps,
    commonCauses: value.commonCauses,
    escalationThreshold: value.escalationThreshold,
  };
}

export function parseTroubleshootingData(value: unknown): TroubleshootingData {
  if (!isRecord(value) || !isRecord(value.guides) || !isRecord(value.relatedMaterials)) {
    throw invalid('expected guides and relatedMaterials objects');
  }
  if (!isStringArray(value.nextActions)) {
    throw invalid('nextActions must be a list of strings');
  }

  const guides: Record<string, IssueGuide> = {};
  for (const [issueType, guide] of Object.entries(value.guides)) {
    guides[issueType] = parseGuide(guide, issueType);
  }

  const relatedMaterials: Record<string, string[]> = {};
  for (const [issueType, materials] of Object.entries(value.relatedMaterials)) {
    if (!isStringArray(materials)) {
      throw invalid(`relatedMaterials.${issueType} must be a list of strings`);
    }
    relatedMaterials[issueType] = materials;
  }

  return {
    guides,
    defaultGuide: parseGuide(value.defaultGuide, 'defaultGuide'),
    nextActions: value.nextActions,
    relatedMaterials,
  };
}

export function loadTroubleshootingData(
  filePath: string = DEFAULT_TROUBLESHOOTING_PATH
): TroubleshootingData {
  const content = readFileSync(filePath, 'utf-8');
  return parseTroubleshootingData(JSON.parse(content));
}
