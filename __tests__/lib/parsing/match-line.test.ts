/**
 * @module match-line.test
 *
 * Test suite for the match line parser (`@/lib/parsing/match-line`).
 *
 * Covers:
 * - regular championship/consolation lines through the primary grammar
 * - the fallback grammar and its diagnostic
 * - placement lines, placement pairs and unknown ordinals
 * - the (SV-1 / (TB-1 overrides
 * - seed extraction beside the record and ahead of the name
 * - unparseable lines
 */
import { DiagnosticsCollector } from '@/lib/diagnostics';
import {
  parseMatchLine,
  splitSeedFromName,
  extractSeed,
  isPlacementLine,
} from '@/lib/parsing/match-line';

const context = { weightClass: '125', lineNumber: 7 };

describe('parseMatchLine', () => {
  let diagnostics: DiagnosticsCollector;

  beforeEach(() => {
    diagnostics = new DiagnosticsCollector();
  });

  describe('regular matches', () => {
    it('should score a championship decision at 1 advancement point', () => {
      const event = parseMatchLine(
        'Champ. Round 1 - John Smith (Iowa) won by decision over Mike Jones (Ohio State)',
        context,
        diagnostics
      );

      expect(event).toMatchObject({
        bracket: 'Championship',
        roundNumber: 1,
        roundLabel: 'Champ R1',
        weightClass: '125',
        winnerName: 'John Smith',
        winnerSchool: 'Iowa',
        loserName: 'Mike Jones',
        loserSchool: 'Ohio State',
        winType: 'Decision',
        winPhrase: 'decision',
        advancementPoints: 1,
        bonusPoints: 0,
        totalPoints: 1,
        grammar: 'primary',
        lineNumber: 7,
      });
      expect(diagnostics.size).toBe(0);
    });

    it('should score a consolation fall at 0.5 advancement plus 2 bonus', () => {
      const event = parseMatchLine(
        'Cons. Round 2 - John Smith (Iowa) won by fall over Mike Jones (Ohio State)',
        context,
        diagnostics
      );

      expect(event).toMatchObject({
        bracket: 'Consolation',
        roundLabel: 'Cons R2',
        winType: 'Fall',
        advancementPoints: 0.5,
        bonusPoints: 2,
        totalPoints: 2.5,
      });
    });

    it('should accept "won in" as well as "won by"', () => {
      const event = parseMatchLine(
        'Champ. Round 2 - John Smith (Iowa) 20-1 won in sudden victory - 1 over Mike Jones (Ohio State) 15-9 (SV-1 4-2)',
        context,
        diagnostics
      );

      expect(event?.winType).toBe('SuddenVictory');
      expect(event?.winPhrase).toBe('sudden victory - 1');
      expect(event?.totalPoints).toBe(1);
    });

    it('should keep the raw line on the event', () => {
      const line = 'Champ. Round 1 - John Smith (Iowa) won by tech fall over Mike Jones (Ohio State) (TF-1.5 4:10 (17-2))';
      const event = parseMatchLine(line, context, diagnostics);

      expect(event?.rawText).toBe(line);
      expect(event?.winType).toBe('TechFall');
      expect(event?.totalPoints).toBe(2.5);
    });

    it('should return a frozen event', () => {
      const event = parseMatchLine(
        'Champ. Round 1 - John Smith (Iowa) won by decision over Mike Jones (Ohio State)',
        context,
        diagnostics
      );

      expect(Object.isFrozen(event)).toBe(true);
    });
  });

  describe('overtime overrides', () => {
    it('should force sudden victory for (SV-1 even when the phrase says decision', () => {
      const event = parseMatchLine(
        'Champ. Round 2 - John Smith (Iowa) won by decision over Mike Jones (Ohio State) (SV-1 5-3)',
        context,
        diagnostics
      );

      expect(event?.winType).toBe('SuddenVictory');
      expect(event?.bonusPoints).toBe(0);
      expect(event?.totalPoints).toBe(1);
      expect(diagnostics.list('sudden-victory')).toHaveLength(1);
      expect(diagnostics.list('sudden-victory')[0].lineNumber).toBe(7);
    });

    it('should force tie breaker for (TB-1 even when the phrase says fall', () => {
      const event = parseMatchLine(
        'Cons. Round 3 - John Smith (Iowa) won by fall over Mike Jones (Ohio State) (TB-1 2-2)',
        context,
        diagnostics
      );

      expect(event?.winType).toBe('TieBreaker');
      expect(event?.bonusPoints).toBe(0);
      expect(event?.totalPoints).toBe(0.5);
      expect(diagnostics.list('tie-breaker')).toHaveLength(1);
    });

    it('should apply the override to placement matches too', () => {
      const event = parseMatchLine(
        '3rd Place Match - John Smith (Iowa) won by major decision over Mike Jones (Ohio State) (SV-1 3-1)',
        context,
        diagnostics
      );

      expect(event?.winType).toBe('SuddenVictory');
      expect(event?.totalPoints).toBe(0);
    });
  });

  describe('fallback grammar', () => {
    it('should parse a line without a win phrase as a decision and note the fallback', () => {
      const event = parseMatchLine(
        'Champ. Round 3 - John Smith (Iowa) won over Mike Jones (Ohio State)',
        context,
        diagnostics
      );

      expect(event).toMatchObject({
        grammar: 'fallback',
        winnerName: 'John Smith',
        loserName: 'Mike Jones',
        loserSchool: 'Ohio State',
        winType: 'Decision',
        winPhrase: 'decision',
        totalPoints: 1,
      });
      expect(diagnostics.list('fallback-pattern')).toHaveLength(1);
    });
  });

  describe('placement matches', () => {
    it('should give placements 1 and 2 and bonus points only for a 1st place match', () => {
      const event = parseMatchLine(
        '1st Place Match - John Smith (Iowa) won by major decision over Mike Jones (Ohio State)',
        context,
        diagnostics
      );

      expect(event).toMatchObject({
        bracket: 'Placement',
        placementMatch: '1st',
        roundLabel: '1st Place Match',
        winnerPlacement: 1,
        loserPlacement: 2,
        winType: 'MajorDecision',
        advancementPoints: 0,
        bonusPoints: 1,
        totalPoints: 1,
        grammar: 'placement',
      });
    });

    it.each([
      ['3rd', 3, 4],
      ['5th', 5, 6],
      ['7th', 7, 8],
    ])('should map the %s place match to placements %i and %i', (ordinal, winnerPlace, loserPlace) => {
      const event = parseMatchLine(
        `${ordinal} Place Match - John Smith (Iowa) won by decision over Mike Jones (Ohio State)`,
        context,
        diagnostics
      );

      expect(event).toMatchObject({ winnerPlacement: winnerPlace, loserPlacement: loserPlace, totalPoints: 0 });
    });

    it('should leave both placements unknown for an even ordinal and flag it', () => {
      const event = parseMatchLine(
        '2nd Place Match - John Smith (Iowa) won by fall over Mike Jones (Ohio State)',
        context,
        diagnostics
      );

      expect(event).toMatchObject({ winnerPlacement: null, loserPlacement: null, bonusPoints: 2 });
      expect(diagnostics.list('unknown-placement')).toHaveLength(1);
    });

    it('should not fall back to the round grammar when a placement line is malformed', () => {
      const event = parseMatchLine('1st Place Match - John Smith won by fall', context, diagnostics);

      expect(event).toBeNull();
      expect(diagnostics.list('unparsed-line')).toHaveLength(1);
    });
  });

  describe('seeds', () => {
    it('should read seeds written beside each record', () => {
      const event = parseMatchLine(
        'Champ. Round 1 - John Smith (Iowa) 20-1 (#3) won by fall over Mike Jones (Ohio State) 15-9 (#14) (Fall 1:23)',
        context,
        diagnostics
      );

      expect(event?.winnerSeed).toBe(3);
      expect(event?.loserSeed).toBe(14);
    });

    it('should lift a seed written ahead of the name', () => {
      const event = parseMatchLine(
        'Champ. Round 1 - #3 John Smith (Iowa) won by fall over Mike Jones (Ohio State)',
        context,
        diagnostics
      );

      expect(event?.winnerName).toBe('John Smith');
      expect(event?.winnerSeed).toBe(3);
      expect(event?.loserSeed).toBeNull();
    });
  });

  describe('unparseable lines', () => {
    it('should return null and record one diagnostic', () => {
      const event = parseMatchLine('Session 3 results posted', context, diagnostics);

      expect(event).toBeNull();
      expect(diagnostics.size).toBe(1);
      expect(diagnostics.list()[0]).toMatchObject({
        kind: 'unparsed-line',
        severity: 'warning',
        lineNumber: 7,
        rawText: 'Session 3 results posted',
      });
    });

    it('should default the line number to 0 outside a transcript', () => {
      parseMatchLine('not a match', { weightClass: null }, diagnostics);

      expect(diagnostics.list()[0].lineNumber).toBe(0);
    });
  });
});

describe('splitSeedFromName', () => {
  it('should split "#4 Name" and "(#4) Name"', () => {
    expect(splitSeedFromName('#4 John Smith')).toEqual({ name: 'John Smith', seed: 4 });
    expect(splitSeedFromName('(#12) John Smith')).toEqual({ name: 'John Smith', seed: 12 });
  });

  it('should leave plain names alone', () => {
    expect(splitSeedFromName(' John Smith ')).toEqual({ name: 'John Smith', seed: null });
  });
});

describe('extractSeed', () => {
  it('should return the first #n annotation or null', () => {
    expect(extractSeed(' 20-1 (#3) ')).toBe(3);
    expect(extractSeed(' 20-1 ')).toBeNull();
  });
});

describe('isPlacementLine', () => {
  it('should detect the ordinal followed by Place Match', () => {
    expect(isPlacementLine('5th Place Match - A (X) won by fall over B (Y)')).toBe(true);
    expect(isPlacementLine('Champ. Round 1 - A (X) won by fall over B (Y)')).toBe(false);
    expect(isPlacementLine('9th Place Match - A (X) won by fall over B (Y)')).toBe(false);
  });
});
