import { Position, RiskSnapshot } from '../../types/trading';

/**
 * Durable storage for the state that must survive a restart: the daily
 * risk ledger and the map of open positions.
 */
export interface PersistenceAdapter {
  loadRiskState(): Promise<RiskSnapshot | null>;
  saveRiskState(state: RiskSnapshot): Promise<void>;
  loadPositions(): Promise<Position[]>;
  savePosition(position: Position): Promise<void>;
  removePosition(positionId: string): Promise<void>;
}

/** Process-local store, used when Redis is not configured and in tests. */
export class MemoryPersistenceAdapter implements PersistenceAdapter {
  private risk: RiskSnapshot | null = null;
  private positions: Map<string, Position> = new Map();

  async loadRiskState(): Promise<RiskSnapshot | null> {
    return this.risk ? structuredClone(this.risk) : null;
  }

  async saveRiskState(state: RiskSnapshot): Promise<void> {
    this.risk = structuredClone(state);
  }

  async loadPositions(): Promise<Position[]> {
    return [...this.positions.values()].map(position => structuredClone(position));
  }

  async savePosition(position: Position): Promise<void> {
    this.positions.set(position.id, structuredClone(position));
  }

  async removePosition(positionId: string): Promise<void> {
    this.positions.delete(positionId);
  }
}
