import { describe, it, expect } from 'vitest';
import { error as logError } from 'firebase-functions/logger';
import { GenerationParseError } from '../types/errors.js';
import {
  extractJsonArrayText,
  parseExerciseProposals,
  MAX_PROPOSALS,
  MIN_PROPOSALS,
} from './exercise-proposal-parser.service.js';

const heelSlides = {
  name: 'Heel Slides',
  description: 'Slide the heel toward the buttocks',
  target_joints: ['knee'],
  instructions: ['Lie on your back', 'Slide heel in', 'Slide heel out'],
};

const quadSets = {
  name: 'Quad Sets',
  description: 'Tighten the thigh with the leg straight',
  target_joints: ['knee'],
  instructions: ['Sit with leg straight', 'Tighten thigh', 'Hold 5 seconds'],
};

const wallSit = {
  name: 'Wall Sit',
  description: 'Hold a seated position against a wall',
  target_joints: ['knee', 'hip'],
  instructions: ['Lean on wall', 'Slide down', 'Hold'],
};

describe('Exercise Proposal Parser', () => {
  describe('extractJsonArrayText', () => {
    it('should take the contents of a json code fence', () => {
      const content = 'Here you go:\n```json\n[{"name":"A"}]\n```\nGood luck!';

      expect(extractJsonArrayText(content)).toBe('[{"name":"A"}]');
    });

    it('should accept an unlabeled fence', () => {
      expect(extractJsonArrayText('```\n[]\n```')).toBe('[]');
    });

    it('should cut a bare array out of surrounding prose', () => {
      expect(extractJsonArrayText('Exercises: [{"name":"A"}] done')).toBe('[{"name":"A"}]');
    });

    it('should fall back to the trimmed content', () => {
      expect(extractJsonArrayText('  {"name":"A"}  ')).toBe('{"name":"A"}');
    });
  });

  describe('parseExerciseProposals', () => {
    it('should parse a fenced array into proposals', () => {
      const content = '```json\n' + JSON.stringify([heelSlides, quadSets, wallSit]) + '\n```';

      expect(parseExerciseProposals(content)).toEqual([heelSlides, quadSets, wallSit]);
    });

    it('should split delimited joints and instructions', () => {
      const content = JSON.stringify([
        {
          name: ' Wall Sit ',
          description: 'Hold a seated position against a wall',
          target_joints: 'knee,ankle',
          instructions: 'Step 1;Step 2',
        },
        heelSlides,
        quadSets,
      ]);

      expect(parseExerciseProposals(content)[0]).toEqual({
        name: 'Wall Sit',
        description: 'Hold a seated position against a wall',
        target_joints: ['knee', 'ankle'],
        instructions: ['Step 1', 'Step 2'],
      });
    });

    it('should drop any video_url the provider volunteers', () => {
      const content = JSON.stringify([
        { ...heelSlides, video_url: 'https://example.com/video' },
        quadSets,
        wallSit,
      ]);

      const [proposal] = parseExerciseProposals(content);

      expect(proposal).toEqual(heelSlides);
    });

    it('should default missing description and lists', () => {
      const proposals = parseExerciseProposals('[{"name":"Quad Sets"},{"name":"B"},{"name":"C"}]');

      expect(proposals[0]).toEqual({
        name: 'Quad Sets',
        description: '',
        target_joints: [],
        instructions: [],
      });
    });

    it('should keep at most five proposals', () => {
      const many = Array.from({ length: 7 }, (_, index) => ({ name: `Exercise ${index + 1}` }));

      const proposals = parseExerciseProposals(JSON.stringify(many));

      expect(proposals).toHaveLength(MAX_PROPOSALS);
      expect(proposals[4]?.name).toBe('Exercise 5');
    });

    it('should reject fewer than three proposals', () => {
      expect(MIN_PROPOSALS).toBe(3);
      expect(() => parseExerciseProposals(JSON.stringify([heelSlides, quadSets]))).toThrow(
        new GenerationParseError('Provider returned 2 exercises, expected at least 3')
      );
      expect(() => parseExerciseProposals('[]')).toThrow(
        'Provider returned 0 exercises, expected at least 3'
      );
    });

    it('should reject an empty response', () => {
      expect(() => parseExerciseProposals('   ')).toThrow(
        new GenerationParseError('Provider returned an empty response')
      );
    });

    it('should log the raw output of invalid JSON and keep it out of the error', () => {
      let caught: unknown;
      try {
        parseExerciseProposals('[{"name": "Heel Slides",]');
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(GenerationParseError);
      if (caught instanceof GenerationParseError) {
        expect(caught.code).toBe('GENERATION_PARSE_ERROR');
        expect(caught.message).toMatch(/^Provider response is not valid JSON: /);
        expect(caught.details).toBeUndefined();
      }
      expect(logError).toHaveBeenCalledWith('generation:parse_failed', {
        phase: 'parse_response',
        error_message: expect.any(String) as unknown as string,
        response_preview: '[{"name": "Heel Slides",]',
      });
    });

    it('should reject a JSON object that is not an array', () => {
      expect(() => parseExerciseProposals('{"name":"Heel Slides"}')).toThrow(
        'Provider response is not a JSON array'
      );
    });

    it('should reject a proposal without a name', () => {
      expect(() => parseExerciseProposals('[{"name":"A"},{"name":"  "},{"name":"C"}]')).toThrow(
        'Proposal 1 is missing a name'
      );
    });

    it('should reject entries that are not objects', () => {
      expect(() => parseExerciseProposals('[{"name":"A"},{"name":"B"},"C"]')).toThrow(
        'Proposal 2 is not an object'
      );
    });
  });
});
