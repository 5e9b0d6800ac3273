import { beforeAll, describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { loadConceptDictionary, type ConceptDictionary } from '../concepts/index.js';
import { analyze, detectDomains } from './analyzer.js';

describe('Rule Analyzer', () => {
  let dictionary: ConceptDictionary;

  beforeAll(async () => {
    dictionary = await loadConceptDictionary();
  });

  describe('analyze', () => {
    it('should emit every fixed rule for an empty design, in rule order', () => {
      const findings = analyze('', dictionary);

      expect(findings.map((f) => f.title)).toEqual(dictionary.rules.map((r) => r.title));
      expect(findings[0]).toEqual({
        title: 'Consider Adding Caching Layer',
        description: dictionary.rules[0]?.description,
        category: 'CACHING',
        severity: 'WARNING',
        triggerKeywords: dictionary.rules[0]?.keywords,
      });
    });

    it('should skip rules whose keywords are present', () => {
      const titles = analyze('REST API with Redis cache', dictionary).map((f) => f.title);

      expect(titles).toHaveLength(15);
      expect(titles).not.toContain('Consider Adding Caching Layer');
      expect(titles[0]).toBe('Add Horizontal Scaling Strategy');
    });

    it('should judge each concept by its own keywords, not by related concepts', () => {
      const findings = analyze('We use a REST API and PostgreSQL.', dictionary);
      const byTitle = new Map(findings.map((f) => [f.title, f.category]));

      expect(findings).toHaveLength(16);
      expect(byTitle.get('Consider Adding Caching Layer')).toBe('CACHING');
      expect(byTitle.get('Add Horizontal Scaling Strategy')).toBe('SCALABILITY');
      expect(byTitle.get('Define Authentication & Authorization')).toBe('SECURITY');
      expect(byTitle.get('Implement Rate Limiting')).toBe('SECURITY');
      expect(byTitle.get('Define Database Indexing Strategy')).toBe('DATABASE');
    });

    it('should suppress a rule when any one of its keywords appears', () => {
      const cases = dictionary.rules.flatMap((rule) =>
        rule.keywords.map((keyword) => ({ title: rule.title, keyword }))
      );

      fc.assert(
        fc.property(fc.constantFrom(...cases), fc.string({ maxLength: 20 }), ({ title, keyword }, noise) => {
          const titles = analyze(`${noise} ${keyword.toUpperCase()} ${noise}`, dictionary).map(
            (f) => f.title
          );
          expect(titles).not.toContain(title);
        })
      );
    });

    it('should add the chat rule after fixed rules when real-time is missing', () => {
      const findings = analyze('A chat app with rooms', dictionary);
      const titles = findings.map((f) => f.title);

      expect(titles).toContain('Implement Real-time Communication');
      expect(titles[titles.length - 1]).toBe('Add Real-time Messaging (Chat Context)');

      const chat = findings[findings.length - 1];
      expect(chat?.severity).toBe('CRITICAL');
      expect(chat?.category).toBe('API_DESIGN');
      expect(chat?.triggerKeywords).toEqual(dictionary.buckets.realtime);
    });

    it('should not add real-time findings when websockets are mentioned', () => {
      const titles = analyze('Chat over WebSockets', dictionary).map((f) => f.title);

      expect(titles).not.toContain('Implement Real-time Communication');
      expect(titles).not.toContain('Add Real-time Messaging (Chat Context)');
    });

    it('should add the media rule only when storage is missing', () => {
      const without = analyze('Users upload video', dictionary);
      expect(without[without.length - 1]?.title).toBe('Implement Media Strategy (S3/CDN)');
      expect(without[without.length - 1]?.triggerKeywords).toEqual(dictionary.buckets.storage);

      const withStorage = analyze('Users upload video to S3', dictionary).map((f) => f.title);
      expect(withStorage).not.toContain('Implement Media Strategy (S3/CDN)');
      expect(withStorage).not.toContain('Define Media Storage Strategy');
    });

    it('should be deterministic', () => {
      fc.assert(
        fc.property(fc.string({ maxLength: 60 }), (content) => {
          expect(analyze(content, dictionary)).toEqual(analyze(content, dictionary));
        })
      );
    });
  });

  describe('detectDomains', () => {
    it('should list matching domains in dictionary order', () => {
      expect(
        detectDomains('Drivers share GPS location; riders pay for the order', dictionary)
      ).toEqual(['ride', 'ecommerce']);
    });

    it('should return an empty list when no hint matches', () => {
      expect(detectDomains('', dictionary)).toEqual([]);
    });
  });
});
