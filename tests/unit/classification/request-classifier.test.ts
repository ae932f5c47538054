/**
 * Request Classifier - Unit Tests
 *
 * Trigger matching is plain substring matching, so short triggers such as
 * "ui" or "ar" also hit inside longer words.
 */

import { describe, it, expect } from 'vitest';
import { RequestClassifier } from '../../../src/classification/request-classifier.js';
import { loadTestSettings } from '../../setup.js';

describe('RequestClassifier', () => {
  const classifier = new RequestClassifier(loadTestSettings().requestCategories);

  describe('simple requests', () => {
    it('picks the only matched category', () => {
      expect(classifier.classifyDetailed('Write a blog post')).toMatchObject({ category: 'write', complex: false });
      expect(classifier.classifyDetailed('Code the login function')).toMatchObject({
        category: 'develop',
        complex: false,
      });
    });

    it('falls back to the default category without matches', () => {
      expect(classifier.classify('hello there')).toBe('default');
      expect(classifier.classify('')).toBe('default');
      expect(classifier.classify('   ')).toBe('default');
      expect(classifier.classify(null)).toBe('default');
    });

    it('stays simple for a short request with a scale indicator', () => {
      expect(classifier.classifyDetailed('Launch the blog')).toMatchObject({ category: 'write', complex: false });
    });
  });

  describe('complex requests', () => {
    it('picks the category with the most hits', () => {
      const text =
        'Create a comprehensive plan to build and implement the backend code, then write the guide for the new team members';
      const detail = classifier.classifyDetailed(text);

      expect(detail.category).toBe('develop');
      expect(detail.complex).toBe(true);
      expect(detail.counts).toEqual({
        'data-science': 0,
        analyze: 0,
        // "ui" inside "build" and "guide"
        design: 1,
        write: 1,
        develop: 4,
      });
    });

    it('breaks ties by declared category order', () => {
      const detail = classifier.classifyDetailed('Write a draft and code the function');

      expect(detail.counts.write).toBe(2);
      expect(detail.counts.develop).toBe(2);
      expect(detail.category).toBe('write');
    });

    it('uses the complex fallback category when a long, large-scale request matches nothing', () => {
      const text =
        'we plan to launch the new coffee shop next month in the old town with all of our close friends';
      const detail = classifier.classifyDetailed(text);

      expect(detail.complex).toBe(true);
      expect(detail.category).toBe('data-science');
    });

    it('counts short triggers inside longer words', () => {
      // "gardening" contains "ar", so write and design both match
      const detail = classifier.classifyDetailed('Write a blog post about gardening');

      expect(detail.counts.design).toBe(1);
      expect(detail.complex).toBe(true);
      expect(detail.category).toBe('write');
    });
  });

  it('is deterministic', () => {
    const text = 'Review the impact of the new regression model';
    expect(classifier.classify(text)).toBe(classifier.classify(text));
  });
});
