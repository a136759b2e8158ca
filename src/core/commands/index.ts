/**
 * Command implementations
 *
 * Each grid edit wrapped as an undoable Command. Commands call the
 * GridMutator, never the grid itself.
 */

import type { CellValue, Command, Position } from '../../types';
import type { GridMutator } from '../GridMutator';

/** Value captured by execute() for undo() to put back */
type Captured<T> = { value: T } | undefined;

// ============================================================================
// InsertCellCommand
// ============================================================================

/**
 * Insert a value inside a row
 */
export class InsertCellCommand<T extends CellValue> implements Command {
    readonly type = 'insertCell' as const;
    readonly description: string;

    constructor(
        private readonly mutator: GridMutator<T>,
        private readonly position: Position,
        private readonly value: T
    ) {
        this.description = `Insert cell (${position[0]}, ${position[1]})`;
    }

    execute(): void {
        this.mutator.insertCell(this.position, this.value);
    }

    undo(): void {
        this.mutator.removeCell(this.position);
    }
}

// ============================================================================
// RemoveCellCommand
// ============================================================================

/**
 * Take a value out of a row
 */
export class RemoveCellCommand<T extends CellValue> implements Command {
    readonly type = 'removeCell' as const;
    readonly description: string;

    private removed: Captured<T>;

    constructor(
        private readonly mutator: GridMutator<T>,
        private readonly position: Position
    ) {
        this.description = `Remove cell (${position[0]}, ${position[1]})`;
    }

    execute(): void {
        this.removed = { value: this.mutator.removeCell(this.position) };
    }

    undo(): void {
        if (this.removed) {
            this.mutator.insertCell(this.position, this.removed.value);
        }
    }

    /**
     * The value taken out; only valid after execute()
     */
    getRemoved(): T {
        if (!this.removed) {
            throw new Error(`${this.description} has not been executed`);
        }
        return this.removed.value;
    }
}

// ============================================================================
// UpdateCellCommand
// ============================================================================

/**
 * Replace a value in place
 *
 * The previous value is read when the command runs, so consecutive edits to
 * the same cell each undo to the value right before them.
 */
export class UpdateCellCommand<T extends CellValue> implements Command {
    readonly type = 'updateCell' as const;
    readonly description: string;

    private previous: Captured<T>;

    constructor(
        private readonly mutator: GridMutator<T>,
        private readonly position: Position,
        private readonly value: T
    ) {
        this.description = `Update cell (${position[0]}, ${position[1]})`;
    }

    execute(): void {
        this.previous = { value: this.mutator.updateCell(this.position, this.value) };
    }

    undo(): void {
        if (this.previous) {
            this.mutator.updateCell(this.position, this.previous.value);
        }
    }
}

// ============================================================================
// SwapCellsCommand
// ============================================================================

export class SwapCellsCommand<T extends CellValue> implements Command {
    readonly type = 'swapCells' as const;
    readonly description: string;

    constructor(
        private readonly mutator: GridMutator<T>,
        private readonly first: Position,
        private readonly second: Position
    ) {
        this.description = `Swap (${first[0]}, ${first[1]}) <-> (${second[0]}, ${second[1]})`;
    }

    execute(): void {
        this.mutator.swapCells(this.first, this.second);
    }

    undo(): void {
        this.mutator.swapCells(this.first, this.second);
    }
}

// ============================================================================
// InsertRowCommand
// ============================================================================

export class InsertRowCommand<T extends CellValue> implements Command {
    readonly type = 'insertRow' as const;
    readonly description: string;

    private readonly values: readonly T[];

    constructor(
        private readonly mutator: GridMutator<T>,
        private readonly row: number,
        values: Iterable<T>
    ) {
        this.values = [...values];
        this.description = `Insert row (index: ${row}, size: ${this.values.length})`;
    }

    execute(): void {
        this.mutator.insertRow(this.row, this.values);
    }

    undo(): void {
        this.mutator.removeRow(this.row);
    }
}

// ============================================================================
// RemoveRowCommand
// ============================================================================

export class RemoveRowCommand<T extends CellValue> implements Command {
    readonly type = 'removeRow' as const;
    readonly description: string;

    private removed: T[] | null = null;

    constructor(
        private readonly mutator: GridMutator<T>,
        private readonly row: number
    ) {
        this.description = `Remove row (index: ${row})`;
    }

    execute(): void {
        this.removed = this.mutator.removeRow(this.row);
    }

    undo(): void {
        if (this.removed !== null) {
            this.mutator.insertRow(this.row, this.removed);
        }
    }

    getRemoved(): readonly T[] {
        return this.removed ?? [];
    }
}

// ============================================================================
// ClearGridCommand
// ============================================================================

export class ClearGridCommand<T extends CellValue> implements Command {
    readonly type = 'clear' as const;
    readonly description = 'Clear grid';

    private snapshot: T[][] | null = null;

    constructor(private readonly mutator: GridMutator<T>) {}

    execute(): void {
        this.snapshot = this.mutator.clear();
    }

    undo(): void {
        if (this.snapshot !== null) {
            this.mutator.restore(this.snapshot);
        }
    }
}

// ============================================================================
// BatchCommand
// ============================================================================

/**
 * Several commands undone and redone as one step
 */
export class BatchCommand implements Command {
    readonly type = 'batch' as const;
    readonly description: string;

    constructor(
        readonly commands: Command[],
        description?: string
    ) {
        this.description = description ?? `Batch (${commands.length} commands)`;
    }

    execute(): void {
        for (const command of this.commands) {
            command.execute();
        }
    }

    /**
     * Reverse order, so later edits are rolled back before the ones they built on
     */
    undo(): void {
        for (let i = this.commands.length - 1; i >= 0; i--) {
            this.commands[i]?.undo();
        }
    }
}
