import type { AnchorSlot, AxisSession, AxisSnapshot, CalibrationPair } from './types';
import { CalibrationError } from '../errors';

export const createAxisSession = <T>(): AxisSession<T> => ({
    phase: 'PICKING_1',
    clicks: [null, null],
    clickCounter: 0,
    confirmed: null,
    values: [null, null],
    undoStack: [],
});

const snapshotOf = <T>(session: AxisSession<T>): AxisSnapshot<T> => ({
    phase: session.phase,
    clicks: session.clicks,
    clickCounter: session.clickCounter,
    confirmed: session.confirmed,
});

const withSlot = <V>(pair: [V, V], slot: AnchorSlot, value: V): [V, V] =>
    slot === 0 ? [value, pair[1]] : [pair[0], value];

// Clicks cycle 1, 2, 1, 2... replacing the earlier point in that slot
export const applyAnchorClick = <T>(session: AxisSession<T>, px: number): AxisSession<T> => {
    const slot: AnchorSlot = session.clickCounter % 2 === 0 ? 0 : 1;
    return {
        ...session,
        phase: slot === 0 ? 'PICKING_2' : 'PICKING_1',
        clicks: withSlot(session.clicks, slot, px),
        clickCounter: session.clickCounter + 1,
        confirmed: null,
        undoStack: [...session.undoStack, snapshotOf(session)],
    };
};

export const applyAnchorValue = <T>(session: AxisSession<T>, slot: AnchorSlot, val: T): AxisSession<T> => ({
    ...session,
    values: withSlot(session.values, slot, val),
});

export const applyUndo = <T>(session: AxisSession<T>): AxisSession<T> => {
    if (session.undoStack.length === 0) return session;
    const previous = session.undoStack[session.undoStack.length - 1];
    return {
        ...session,
        ...previous,
        undoStack: session.undoStack.slice(0, -1),
    };
};

// Both clicks and both values present, in slot order
export const collectAnchors = <T>(axis: 'X' | 'Y', session: AxisSession<T>): CalibrationPair<T> => {
    const [c1, c2] = session.clicks;
    const [v1, v2] = session.values;
    if (c1 === null || c2 === null) {
        throw new CalibrationError('Click both reference points before confirming', axis);
    }
    if (v1 === null || v2 === null) {
        throw new CalibrationError('Enter values for both reference points before confirming', axis);
    }
    return [
        { px: c1, val: v1 },
        { px: c2, val: v2 },
    ];
};

export const applyConfirm = <T>(session: AxisSession<T>, pair: CalibrationPair<T>): AxisSession<T> => ({
    ...session,
    phase: 'CONFIRMED',
    confirmed: pair,
    undoStack: [...session.undoStack, snapshotOf(session)],
});
