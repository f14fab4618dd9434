import { describe, it, expect } from 'vitest';
import { JurisdictionAnalyzer } from '../risk/jurisdiction-analyzer.js';
import { entity, task } from './fixtures.js';

const analyzer = new JurisdictionAnalyzer();

describe('JurisdictionAnalyzer', () => {
  describe('analyzeJurisdictionRisk', () => {
    it('uses the jurisdiction complexity for a single jurisdiction', () => {
      const result = analyzer.analyzeJurisdictionRisk(
        entity({ industry: 'RETAIL', jurisdictions: ['US_STATE'] }),
        task(),
      );
      expect(result.score).toBe(0.6);
      expect(result.reasoning).toEqual([]);
    });

    it('never decreases as jurisdictions are added', () => {
      const one = analyzer.analyzeJurisdictionRisk(
        entity({ industry: 'RETAIL', jurisdictions: ['US_STATE'] }),
        task(),
      );
      const two = analyzer.analyzeJurisdictionRisk(
        entity({ industry: 'RETAIL', jurisdictions: ['US_STATE', 'CANADA'] }),
        task(),
      );
      const three = analyzer.analyzeJurisdictionRisk(
        entity({ industry: 'RETAIL', jurisdictions: ['US_STATE', 'CANADA', 'EU'] }),
        task(),
      );

      expect(one.score).toBe(0.6);
      expect(two.score).toBe(0.8);
      expect(three.score).toBe(0.9);
      expect(two.reasoning[0]).toBe(
        'Multi-jurisdictional scope (2 jurisdictions) increases regulatory complexity',
      );
    });

    it('applies industry-specific jurisdiction risk', () => {
      const result = analyzer.analyzeJurisdictionRisk(
        entity({ industry: 'FINANCIAL_SERVICES', jurisdictions: ['EU'] }),
        task(),
      );
      expect(result.score).toBe(0.95);
      expect(result.reasoning).toEqual([
        'EU jurisdiction: GDPR compliance mandatory (strict penalties)',
        'FINANCIAL_SERVICES in EU: Heightened regulatory scrutiny',
      ]);
    });

    it('raises cross-border work to at least 0.85', () => {
      const generic = analyzer.analyzeJurisdictionRisk(
        entity({ industry: 'RETAIL', jurisdictions: ['US_STATE'] }),
        task({ involvesCrossBorder: true }),
      );
      expect(generic.score).toBe(0.85);
      expect(generic.reasoning).toEqual(['Cross-border data transfer: Additional compliance requirements']);

      const eu = analyzer.analyzeJurisdictionRisk(
        entity({ industry: 'RETAIL', jurisdictions: ['EU'] }),
        task({ involvesCrossBorder: true }),
      );
      expect(eu.score).toBe(0.9);
      expect(eu.reasoning).toContain(
        'Cross-border data transfer with EU: Schrems II compliance and adequacy decisions required',
      );
    });

    it('assumes moderate risk without any jurisdiction', () => {
      const result = analyzer.analyzeJurisdictionRisk({ ...entity(), jurisdictions: [] }, task());
      expect(result.score).toBe(0.5);
      expect(result.reasoning).toEqual(['No jurisdiction specified - assuming moderate risk']);
    });
  });

  describe('identifyApplicableRegulations', () => {
    it('lists regulations in jurisdiction order', () => {
      const regulations = analyzer.identifyApplicableRegulations(
        entity({ industry: 'FINANCIAL_SERVICES', jurisdictions: ['US_FEDERAL', 'EU'] }),
        task({ category: 'DATA_PRIVACY', affectsPersonalData: true }),
      );
      expect(regulations).toEqual([
        'SOX (Sarbanes-Oxley)',
        'GLBA',
        'Dodd-Frank',
        'FTC Act (Consumer Privacy)',
        'GDPR (General Data Protection Regulation)',
        'MiFID II',
        'PSD2',
        'ePrivacy Directive',
      ]);
    });

    it('covers healthcare in Canada', () => {
      const regulations = analyzer.identifyApplicableRegulations(
        entity({ industry: 'HEALTHCARE', jurisdictions: ['CANADA', 'UK'] }),
        task(),
      );
      expect(regulations).toEqual([
        'PIPEDA (Personal Information Protection)',
        'Provincial Health Privacy Laws',
        'UK GDPR',
      ]);
    });

    it('returns nothing for jurisdictions without a catalog', () => {
      expect(
        analyzer.identifyApplicableRegulations(entity({ jurisdictions: ['APAC', 'US_STATE'] }), task()),
      ).toEqual([]);
    });
  });
});
