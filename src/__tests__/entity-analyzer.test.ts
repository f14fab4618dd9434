import { describe, it, expect } from 'vitest';
import { EntityAnalyzer } from '../risk/entity-analyzer.js';
import { entity, highRiskEntity, task } from './fixtures.js';

const analyzer = new EntityAnalyzer();

describe('EntityAnalyzer', () => {
  describe('analyzeEntityRisk', () => {
    it('averages entity type and industry risk', () => {
      const result = analyzer.analyzeEntityRisk(entity(), task());
      expect(result.score).toBeCloseTo(0.65, 12);
      expect(result.reasoning).toEqual(['Industry: TECHNOLOGY - Moderate regulatory requirements']);
    });

    it('caps the violation adjustment at 0.30', () => {
      const result = analyzer.analyzeEntityRisk(
        entity({ entityType: 'STARTUP', industry: 'OTHER', previousViolations: 5 }),
        task(),
      );
      expect(result.score).toBeCloseTo(0.75, 12);
      expect(result.reasoning).toContain('5 previous violation(s): Increased regulatory scrutiny expected');
    });

    it('adds size and revenue adjustments', () => {
      const result = analyzer.analyzeEntityRisk(
        entity({ employeeCount: 6000, annualRevenue: 2_000_000_000 }),
        task(),
      );
      expect(result.score).toBeCloseTo(0.75, 12);
      expect(result.reasoning).toContain('Large organization (5000+ employees): More complex operations');
    });

    it('adds the personal data adjustment only when the task touches it', () => {
      const holder = entity({ hasPersonalData: true });
      const untouched = analyzer.analyzeEntityRisk(holder, task());
      const touched = analyzer.analyzeEntityRisk(holder, task({ affectsPersonalData: true }));
      expect(touched.score - untouched.score).toBeCloseTo(0.05, 12);
    });

    it('never exceeds 1', () => {
      const result = analyzer.analyzeEntityRisk(highRiskEntity(), task({ affectsPersonalData: true }));
      expect(result.score).toBe(1);
      expect(result.reasoning[0]).toBe(
        'Financial institution: Highest compliance standards, regular audits, strict regulatory oversight',
      );
    });
  });

  describe('assessCapability', () => {
    it('rates public companies highly', () => {
      expect(analyzer.assessCapability(entity({ entityType: 'PUBLIC_COMPANY' }))).toEqual({
        description: 'High - Likely has dedicated compliance team',
        autonomyConfidence: 0.8,
      });
    });

    it('discounts a violation history', () => {
      const capability = analyzer.assessCapability(
        entity({ entityType: 'PUBLIC_COMPANY', previousViolations: 1 }),
      );
      expect(capability.autonomyConfidence).toBeCloseTo(0.64, 12);
      expect(capability.description).toBe(
        'High - Likely has dedicated compliance team (1 previous violation(s))',
      );
    });

    it('rates very small organizations low', () => {
      expect(analyzer.assessCapability(entity({ employeeCount: 20 }))).toEqual({
        description: 'Low - May need external guidance',
        autonomyConfidence: 0.4,
      });
    });
  });
});
