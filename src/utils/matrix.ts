// Gaussian elimination with partial pivoting. Inputs are left untouched.
export function solveLinearSystem(matrix: readonly (readonly number[])[], rhs: readonly number[]): number[] | null {
    const n = rhs.length;
    const A = matrix.map(row => [...row]);
    const B = [...rhs];

    for (let i = 0; i < n; i++) {
        let maxRow = i;
        for (let k = i + 1; k < n; k++) {
            if (Math.abs(A[k][i]) > Math.abs(A[maxRow][i])) maxRow = k;
        }
        [A[i], A[maxRow]] = [A[maxRow], A[i]];
        [B[i], B[maxRow]] = [B[maxRow], B[i]];

        if (Math.abs(A[i][i]) < 1e-10) return null; // Singular

        for (let k = i + 1; k < n; k++) {
            const c = -A[k][i] / A[i][i];
            A[k][i] = 0;
            for (let j = i + 1; j < n; j++) {
                A[k][j] += c * A[i][j];
            }
            B[k] += c * B[i];
        }
    }

    const x = new Array<number>(n).fill(0);
    for (let i = n - 1; i >= 0; i--) {
        let sum = 0;
        for (let j = i + 1; j < n; j++) {
            sum += A[i][j] * x[j];
        }
        x[i] = (B[i] - sum) / A[i][i];
    }
    return x;
}
