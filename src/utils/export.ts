import type { CalibratedSeries } from '../types';
import { CSV_HEADER } from '../config';

export const generateTableData = (series: CalibratedSeries, delimiter: string = ','): string => {
    const lines: string[] = [CSV_HEADER.join(delimiter)];

    series.forEach(sample => {
        lines.push([sample.date, sample.value.toString()].join(delimiter));
    });

    return lines.join('\n');
};
