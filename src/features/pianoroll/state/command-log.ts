// src/features/pianoroll/state/command-log.ts

/**
 * Commande d'annulation : snapshots complets avant / après + libellé.
 */
export type Command<S> = {
  readonly beforeState: S;
  readonly afterState: S;
  readonly label: string;
};

export type CommandLogOptions<S> = {
  /**
   * Seul canal par lequel un état revient dans le modèle visible.
   * Doit être idempotent et ne jamais pousser de commande.
   */
  apply: (state: S) => void;
  /** Profondeur max de la pile d'annulation (null / absent = illimitée) */
  limit?: number | null;
};

/**
 * CommandLog
 * ----------
 * Pile undo (LIFO) + pile redo, propre à une session d'édition.
 * - execute : applique `afterState` puis empile
 * - record : empile sans appliquer (l'état est déjà en place)
 * - toute nouvelle commande vide la pile redo
 * Les commandes sans effet sont enregistrées telles quelles (pas de dédup).
 */
export class CommandLog<S> {
  private _history: Command<S>[] = []; // pile d'annulation (undo)
  private _future: Command<S>[] = []; // pile de rétablissement (redo), la plus récente en tête
  private readonly listeners = new Set<() => void>();
  private readonly apply: (state: S) => void;
  private readonly limit: number | null;

  constructor(options: CommandLogOptions<S>) {
    this.apply = options.apply;
    const limit = options.limit ?? null;
    this.limit = limit !== null && Number.isInteger(limit) && limit > 0 ? limit : null;
  }

  execute(command: Command<S>): void {
    this.apply(command.afterState);
    this.record(command);
  }

  record(command: Command<S>): void {
    this._history.push(command);
    if (this.limit !== null && this._history.length > this.limit) {
      // Éviction des plus anciennes
      this._history.splice(0, this._history.length - this.limit);
    }
    this._future = [];
    this.emit();
  }

  /** Réapplique `beforeState` de la dernière commande. false si la pile est vide. */
  undo(): boolean {
    const command = this._history.pop();
    if (!command) return false;
    this._future.unshift(command);
    this.apply(command.beforeState);
    this.emit();
    return true;
  }

  redo(): boolean {
    const command = this._future.shift();
    if (!command) return false;
    this._history.push(command);
    this.apply(command.afterState);
    this.emit();
    return true;
  }

  get canUndo(): boolean {
    return this._history.length > 0;
  }

  get canRedo(): boolean {
    return this._future.length > 0;
  }

  get undoLabel(): string | null {
    return this._history[this._history.length - 1]?.label ?? null;
  }

  get redoLabel(): string | null {
    return this._future[0]?.label ?? null;
  }

  /** Libellés undo, du plus récent au plus ancien. */
  get undoHistory(): string[] {
    return this._history.map((c) => c.label).reverse();
  }

  /** Libellés redo, du prochain à rétablir au plus lointain. */
  get redoHistory(): string[] {
    return this._future.map((c) => c.label);
  }

  clear(): void {
    if (this._history.length === 0 && this._future.length === 0) return;
    this._history = [];
    this._future = [];
    this.emit();
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(): void {
    for (const listener of this.listeners) listener();
  }
}
