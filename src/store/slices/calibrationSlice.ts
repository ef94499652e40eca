import type { StoreSlice, CalibrationSlice, CalendarDate } from '../types';
import {
    applyAnchorClick,
    applyAnchorValue,
    applyConfirm,
    applyUndo,
    collectAnchors,
    createAxisSession,
} from '../utils';
import { buildXAxisMap, buildYAxisMap } from '../../utils/math';

export const createCalibrationSlice: StoreSlice<CalibrationSlice> = (set, get) => ({
    yAxis: createAxisSession<number>(),
    xAxis: createAxisSession<CalendarDate>(),

    clickAnchor: (axis, px) => set(state => axis === 'Y'
        ? { yAxis: applyAnchorClick(state.yAxis, px) }
        : { xAxis: applyAnchorClick(state.xAxis, px) }),

    setYValue: (slot, val) => set(state => ({ yAxis: applyAnchorValue(state.yAxis, slot, val) })),

    setXDate: (slot, date) => set(state => ({ xAxis: applyAnchorValue(state.xAxis, slot, date) })),

    undoAnchor: (axis) => set(state => axis === 'Y'
        ? { yAxis: applyUndo(state.yAxis) }
        : { xAxis: applyUndo(state.xAxis) }),

    // Builds the axis map once so bad anchors are reported at confirm time
    confirmAxis: (axis) => {
        const state = get();
        if (axis === 'Y') {
            const pair = collectAnchors('Y', state.yAxis);
            buildYAxisMap(pair, state.yScale);
            set({ yAxis: applyConfirm(state.yAxis, pair) });
        } else {
            const pair = collectAnchors('X', state.xAxis);
            buildXAxisMap(pair);
            set({ xAxis: applyConfirm(state.xAxis, pair) });
        }
    },

    resetAxis: (axis) => set(axis === 'Y'
        ? { yAxis: createAxisSession<number>() }
        : { xAxis: createAxisSession<CalendarDate>() }),
});
