/**
 * Tests for the workshop content index and troubleshooting data
 */

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadTroubleshootingData, parseTroubleshootingData } from '../../../src/content/troubleshooting-data';
import {
  categorizeTitle,
  loadCatalogFile,
  loadWorkshopContent,
  parseWorkshopCatalog,
  WorkshopContentIndex,
} from '../../../src/content/workshop-content';
import { WorkshopError } from '../../../src/errors';
import { createMockLogger } from '../../helpers/logger';

describe('categorizeTitle', () => {
  it('should put lab titles under labs', () => {
    expect(categorizeTitle('Lab 3 - Require HTTPS')).toBe('labs');
  });

  it('should recognize setup guides', () => {
    expect(categorizeTitle('Prepare Your Lab')).toBe('setupGuides');
    expect(categorizeTitle('S3 Access Grants Lab - Initial Setup')).toBe('setupGuides');
  });

  it('should recognize tools and services', () => {
    expect(categorizeTitle('Monitor S3 Data Events with CloudTrail')).toBe('toolsAndServices');
    expect(categorizeTitle('Evaluate Bucket Settings with AWS Config')).toBe('toolsAndServices');
  });

  it('should let security keywords win over tool names', () => {
    expect(categorizeTitle('Query Server Access Logs with Athena')).toBe('securityTopics');
  });

  it('should default unmatched titles to security topics', () => {
    expect(categorizeTitle('Clean Up Workshop Resources')).toBe('securityTopics');
  });

  it('should match keywords case-sensitively', () => {
    expect(categorizeTitle('lab notes')).toBe('securityTopics');
  });
});

describe('WorkshopContentIndex', () => {
  const index = new WorkshopContentIndex(loadCatalogFile(), {
    permission: ['Attach IAM Role to EC2 Instance'],
  });

  it('should sort the bundled catalog into sections', () => {
    expect(index.documentCount).toBe(16);
    expect(index.getSection('labs')).toHaveLength(6);
    expect(index.getSection('setupGuides')).toEqual([
      'Prepare Your Lab',
      'S3 Access Grants Lab - Initial Setup',
    ]);
    expect(index.getSection('toolsAndServices')).toEqual([
      'Monitor S3 Data Events with CloudTrail',
      'GuardDuty Malware Protection for S3',
      'Evaluate Bucket Settings with AWS Config',
    ]);
  });

  it('should format the workshop overview', () => {
    const small = new WorkshopContentIndex({
      workshopTitle: 'S3 Security',
      documents: ['Lab 1 - Block Public Access', 'Prepare Your Lab', 'GuardDuty Findings'],
    });

    expect(small.getWorkshopContext()).toBe(
      [
        'Workshop: S3 Security',
        '',
        'Available Labs:',
        '- Lab 1 - Block Public Access',
        '',
        'Setup Guides:',
        '- Prepare Your Lab',
        '',
        'Security Topics Covered:',
        '',
        '',
        'AWS Services & Tools:',
        '- GuardDuty Findings',
      ].join('\n')
    );
  });

  it('should find relevant titles in lab, topic, tool order', () => {
    expect(index.getRelevantContent('athena ACLs')).toEqual([
      'Lab: Lab 2 - Disable S3 ACLs',
      'Topic: Block Public ACLs',
      'Topic: Query Server Access Logs with Athena',
    ]);
    expect(index.getRelevantContent('guardduty')).toEqual([
      'Tool: GuardDuty Malware Protection for S3',
    ]);
  });

  it('should not report setup guides as relevant content', () => {
    expect(index.getRelevantContent('prepare')).toEqual([]);
  });

  it('should return nothing for a blank query', () => {
    expect(index.getRelevantContent('   ')).toEqual([]);
  });

  it('should look up related materials by issue type', () => {
    expect(index.getTroubleshootingContext('permission')).toEqual([
      'Attach IAM Role to EC2 Instance',
    ]);
    expect(index.getTroubleshootingContext('login')).toEqual([]);
  });
});

describe('catalog loading', () => {
  it('should reject a malformed catalog', () => {
    expect(() => parseWorkshopCatalog({ workshopTitle: 'x', documents: [1] })).toThrow(
      WorkshopError
    );
  });

  it('should read document titles from a PDF directory', () => {
    const directory = mkdtempSync(join(tmpdir(), 'workshop-content-'));
    try {
      writeFileSync(join(directory, 'Lab 2 - Disable S3 ACLs.pdf'), '');
      writeFileSync(join(directory, 'Lab 1 - Configure S3 Block Public Access.PDF'), '');
      writeFileSync(join(directory, 'notes.txt'), '');

      const index = loadWorkshopContent(
        { contentDirectory: directory, workshopTitle: 'Custom Workshop' },
        createMockLogger()
      );

      expect(index.workshopTitle).toBe('Custom Workshop');
      expect(index.getSection('labs')).toEqual([
        'Lab 1 - Configure S3 Block Public Access',
        'Lab 2 - Disable S3 ACLs',
      ]);
    } finally {
      rmSync(directory, { recursive: true, force: true });
    }
  });

  it('should fall back to the bundled catalog when the directory is missing', () => {
    const logger = createMockLogger();
    const index = loadWorkshopContent(
      { contentDirectory: join(tmpdir(), 'no-such-workshop-dir-for-tests') },
      logger
    );

    expect(index.documentCount).toBe(16);
    expect(index.workshopTitle).toBe(
      'Configuring Amazon S3 Security Settings and Access Controls'
    );
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});

describe('troubleshooting data', () => {
  it('should load the bundled guides', () => {
    const data = loadTroubleshootingData();
    expect(Object.keys(data.guides)).toEqual(['login', 'permission', 'security', 'setup']);
    expect(data.defaultGuide.steps).toEqual([
      'Contact facilitator for assistance with this specific issue',
    ]);
    expect(data.relatedMaterials.setup).toEqual([
      'Prepare Your Lab',
      'S3 Access Grants Lab - Initial Setup',
    ]);
  });

  it('should reject a guide without steps', () => {
    expect(() =>
      parseTroubleshootingData({
        guides: { login: { commonCauses: [], escalationThreshold: 1 } },
        defaultGuide: { steps: [], commonCauses: [], escalationThreshold: 1 },
        nextActions: [],
        relatedMaterials: {},
      })
    ).toThrow('Invalid troubleshooting data: guide "login" needs steps, commonCauses and escalationThreshold');
  });
});
