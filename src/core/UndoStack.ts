/**
 * UndoStack - undo/redo history
 *
 * Records executed commands so they can be reverted and replayed.
 *
 * @example
 * const history = new UndoStack();
 *
 * history.push(new InsertCellCommand(mutator, [0, 1], 'x'));
 *
 * history.undo();
 * history.redo();
 *
 * // Group several edits into one undo step
 * history.beginBatch('fill row 2');
 * history.push(command1);
 * history.push(command2);
 * history.endBatch();
 */

import type { Command, UndoStackEvents } from '../types';
import { SimpleEventEmitter } from './SimpleEventEmitter';
import { BatchCommand } from './commands';

export interface UndoStackOptions {
    /** Oldest entries are dropped beyond this many (default: 100) */
    maxSize?: number;
}

export class UndoStack extends SimpleEventEmitter<UndoStackEvents> {
    private undoStack: Command[] = [];
    private redoStack: Command[] = [];
    private readonly maxSize: number;

    private batchBuffer: Command[] | null = null;
    private batchDescription: string | undefined;

    constructor(options: UndoStackOptions = {}) {
        super();
        this.maxSize = Math.max(1, options.maxSize ?? 100);
    }

    // =========================================================================
    // Batch mode
    // =========================================================================

    /**
     * Start collecting commands into a single undo step
     *
     * Starting a batch while one is open closes the open one first.
     */
    beginBatch(description?: string): void {
        if (this.batchBuffer !== null) {
            this.endBatch();
        }
        this.batchBuffer = [];
        this.batchDescription = description;
    }

    /**
     * Close the batch; an empty batch leaves no history entry
     */
    endBatch(): void {
        if (this.batchBuffer === null) return;

        const buffered = this.batchBuffer;
        const description = this.batchDescription;
        this.batchBuffer = null;
        this.batchDescription = undefined;

        if (buffered.length > 0) {
            // Commands already ran in push()
            this.record(new BatchCommand(buffered, description));
        }
    }

    get isBatching(): boolean {
        return this.batchBuffer !== null;
    }

    // =========================================================================
    // History
    // =========================================================================

    /**
     * Execute a command and record it
     *
     * A command that throws is not recorded.
     */
    push(command: Command): void {
        command.execute();

        if (this.batchBuffer !== null) {
            this.batchBuffer.push(command);
            return;
        }

        this.record(command);
    }

    /**
     * Execute without recording
     */
    executeOnly(command: Command): void {
        command.execute();
    }

    undo(): boolean {
        const command = this.undoStack.pop();
        if (!command) return false;

        command.undo();
        this.redoStack.push(command);

        this.emit('undo', { command });
        this.emitStateChange();
        return true;
    }

    redo(): boolean {
        const command = this.redoStack.pop();
        if (!command) return false;

        command.execute();
        this.undoStack.push(command);

        this.emit('redo', { command });
        this.emitStateChange();
        return true;
    }

    get canUndo(): boolean {
        return this.undoStack.length > 0;
    }

    get canRedo(): boolean {
        return this.redoStack.length > 0;
    }

    get undoCount(): number {
        return this.undoStack.length;
    }

    get redoCount(): number {
        return this.redoStack.length;
    }

    clear(): void {
        this.undoStack = [];
        this.redoStack = [];
        this.batchBuffer = null;
        this.batchDescription = undefined;
        this.emit('clear', undefined);
        this.emitStateChange();
    }

    peekUndo(): Command | undefined {
        return this.undoStack[this.undoStack.length - 1];
    }

    peekRedo(): Command | undefined {
        return this.redoStack[this.redoStack.length - 1];
    }

    private record(command: Command): void {
        this.undoStack.push(command);
        this.redoStack = [];

        if (this.undoStack.length > this.maxSize) {
            this.undoStack.shift();
        }

        this.emit('push', { command });
        this.emitStateChange();
    }

    private emitStateChange(): void {
        this.emit('stateChange', {
            canUndo: this.canUndo,
            canRedo: this.canRedo,
        });
    }
}
