import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import { JsonCatalogProvider, normalizeCategory, parseCatalogEntries } from '@/services/providers/catalog/json-catalog';

describe('normalizeCategory', () => {
  it.each([
    ['Knowledge & Skills', 'Knowledge & Skills'],
    ['knowledge & skills', 'Knowledge & Skills'],
    ['K', 'Knowledge & Skills'],
    ['Knowledge/Skills', 'Knowledge & Skills'],
    ['C', 'Ability & Aptitude'],
    ['Aptitude', 'Ability & Aptitude'],
    ['Personality & Behaviour', 'Personality & Behavior'],
    ['Simulation', 'Simulations'],
    ['Assessment Exercises', 'Other'],
  ])('maps %s to %s', (label, expected) => {
    expect(normalizeCategory(label)).toBe(expected);
  });
});

describe('parseCatalogEntries', () => {
  const raw = [
    {
      id: 'opq',
      name: 'Occupational Personality',
      url: 'https://assessments.example.com/catalog/opq/',
      categories: ['P', 'Personality & Behavior', 'Simulation'],
      adaptive_support: true,
    },
    {
      assessment_name: 'Java 8',
      url: 'https://assessments.example.com/catalog/java-8/',
      description: '  Java language knowledge  ',
      test_type: 'K',
      test_type_full: 'Knowledge & Skills',
      adaptive_support: 'No',
      remote_support: 'Yes',
      duration: '30',
    },
    { name: 'No url or categories' },
    {
      id: 'opq',
      name: 'Duplicate',
      url: 'https://assessments.example.com/catalog/dup/',
      categories: 'K',
    },
  ];

  it('normalizes both entry shapes and reports skipped entries', () => {
    const { records, skipped, duplicates } = parseCatalogEntries(raw);

    expect(skipped).toBe(1);
    expect(duplicates).toBe(1);
    expect(records).toEqual([
      {
        id: 'opq',
        name: 'Occupational Personality',
        url: 'https://assessments.example.com/catalog/opq/',
        description: '',
        categories: ['Personality & Behavior', 'Simulations'],
        durationMinutes: null,
        adaptiveSupport: true,
        remoteSupport: false,
      },
      {
        id: 'https://assessments.example.com/catalog/java-8/',
        name: 'Java 8',
        url: 'https://assessments.example.com/catalog/java-8/',
        description: 'Java language knowledge',
        categories: ['Knowledge & Skills'],
        durationMinutes: 30,
        adaptiveSupport: false,
        remoteSupport: true,
      },
    ]);
  });

  it('freezes records', () => {
    const { records } = parseCatalogEntries(raw);
    expect(Object.isFrozen(records[0])).toBe(true);
    expect(Object.isFrozen(records[0].categories)).toBe(true);
  });

  it('rejects a non-array document', () => {
    expect(() => parseCatalogEntries({ records: [] })).toThrow('Catalog must be a JSON array of records');
  });
});

describe('JsonCatalogProvider', () => {
  it('loads the bundled sample catalog', async () => {
    const filePath = fileURLToPath(new URL('../data/catalog.json', import.meta.url));
    const records = await new JsonCatalogProvider(filePath).loadRecords();

    expect(records).toHaveLength(24);
    expect(new Set(records.map((r) => r.id)).size).toBe(24);
    expect(records[0].id).toBe('java-core');
    expect(records[4].id).toBe('https://assessments.example.com/catalog/javascript-web/');
  });

  it('fails on a missing file', async () => {
    await expect(new JsonCatalogProvider('/nonexistent/catalog.json').loadRecords()).rejects.toThrow();
  });
});
