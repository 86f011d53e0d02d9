import { CheckersRuleEngineAdapter } from '../../src/server/game/RuleEngineAdapter';

describe('CheckersRuleEngineAdapter', () => {
  it('reports the opening position', () => {
    const adapter = new CheckersRuleEngineAdapter();

    expect(adapter.turnOwner()).toBe(1);
    expect(adapter.legalMoves()).toHaveLength(7);
    expect(adapter.isOver()).toBe(false);
    expect(adapter.winner()).toBeNull();
    expect(adapter.pieces()).toHaveLength(24);
  });

  it('applies a legal move and returns true', () => {
    const adapter = new CheckersRuleEngineAdapter();

    expect(adapter.applyMove([11, 15])).toBe(true);
    expect(adapter.turnOwner()).toBe(2);
  });

  it('returns false instead of throwing for an illegal move', () => {
    const adapter = new CheckersRuleEngineAdapter();

    expect(adapter.applyMove([1, 5])).toBe(false);
    expect(adapter.turnOwner()).toBe(1);
  });

  it('returns false once the game is over', () => {
    const adapter = new CheckersRuleEngineAdapter({
      pieces: [
        { player: 1, position: 14 },
        { player: 2, position: 18 },
      ],
    });

    expect(adapter.applyMove([14, 23])).toBe(true);
    expect(adapter.isOver()).toBe(true);
    expect(adapter.winner()).toBe(1);
    expect(adapter.applyMove([23, 27])).toBe(false);
  });

  it('passes the draw limit through to the engine', () => {
    const adapter = new CheckersRuleEngineAdapter({
      pieces: [
        { player: 1, position: 14, king: true },
        { player: 2, position: 19, king: true },
      ],
      drawMoveLimit: 1,
    });

    expect(adapter.applyMove([14, 10])).toBe(true);
    expect(adapter.isOver()).toBe(true);
    expect(adapter.winner()).toBeNull();
  });
});
