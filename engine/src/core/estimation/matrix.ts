/**
 * 행렬 연산 유틸리티
 *
 * 칼만 필터와 다변측량에서 쓰는 작은 밀집 행렬(4x4 이하) 전용.
 */

export type Matrix = number[][];

/**
 * 행렬 덧셈: A + B
 */
export function matrixAdd(A: Matrix, B: Matrix): Matrix {
  return A.map((row, i) => row.map((value, j) => value + B[i][j]));
}

/**
 * 행렬 뺄셈: A - B
 */
export function matrixSubtract(A: Matrix, B: Matrix): Matrix {
  return A.map((row, i) => row.map((value, j) => value - B[i][j]));
}

/**
 * 행렬 곱셈: A * B
 */
export function matrixMultiply(A: Matrix, B: Matrix): Matrix {
  const rowsA = A.length;
  const colsA = A[0].length;
  const colsB = B[0].length;
  const result: Matrix = [];
  for (let i = 0; i < rowsA; i++) {
    result[i] = [];
    for (let j = 0; j < colsB; j++) {
      let sum = 0;
      for (let k = 0; k < colsA; k++) {
        sum += A[i][k] * B[k][j];
      }
      result[i][j] = sum;
    }
  }
  return result;
}

/**
 * 행렬 전치: A^T
 */
export function matrixTranspose(A: Matrix): Matrix {
  const rows = A.length;
  const cols = A[0].length;
  const result: Matrix = [];
  for (let j = 0; j < cols; j++) {
    result[j] = [];
    for (let i = 0; i < rows; i++) {
      result[j][i] = A[i][j];
    }
  }
  return result;
}

/**
 * 행렬 스칼라 곱: c * A
 */
export function matrixScalarMultiply(c: number, A: Matrix): Matrix {
  return A.map((row) => row.map((value) => c * value));
}

/**
 * 단위 행렬 생성: I_n
 */
export function identityMatrix(n: number): Matrix {
  return diagonalMatrix(new Array<number>(n).fill(1));
}

/**
 * 대각 행렬 생성
 */
export function diagonalMatrix(diag: number[]): Matrix {
  const n = diag.length;
  const result: Matrix = [];
  for (let i = 0; i < n; i++) {
    result[i] = [];
    for (let j = 0; j < n; j++) {
      result[i][j] = i === j ? diag[i] : 0;
    }
  }
  return result;
}

/**
 * 행렬 역행렬 (가우스-조던 소거법)
 *
 * 피벗이 0에 가까우면 null (호출 측에서 처리)
 */
export function matrixInverse(A: Matrix): Matrix | null {
  const n = A.length;

  // 증강 행렬 [A | I]
  const augmented: Matrix = [];
  for (let i = 0; i < n; i++) {
    augmented[i] = [...A[i]];
    for (let j = 0; j < n; j++) {
      augmented[i].push(i === j ? 1 : 0);
    }
  }

  for (let col = 0; col < n; col++) {
    // 부분 피벗팅
    let maxRow = col;
    for (let row = col + 1; row < n; row++) {
      if (Math.abs(augmented[row][col]) > Math.abs(augmented[maxRow][col])) {
        maxRow = row;
      }
    }

    [augmented[col], augmented[maxRow]] = [augmented[maxRow], augmented[col]];

    const pivot = augmented[col][col];
    if (Math.abs(pivot) < 1e-12) {
      return null;
    }

    for (let j = 0; j < 2 * n; j++) {
      augmented[col][j] /= pivot;
    }

    for (let row = 0; row < n; row++) {
      if (row !== col) {
        const factor = augmented[row][col];
        for (let j = 0; j < 2 * n; j++) {
          augmented[row][j] -= factor * augmented[col][j];
        }
      }
    }
  }

  return augmented.map((row) => row.slice(n));
}

/**
 * 벡터를 열벡터(행렬)로 변환
 */
export function vectorToColumnMatrix(v: number[]): Matrix {
  return v.map((val) => [val]);
}

/**
 * 열벡터(행렬)를 벡터로 변환
 */
export function columnMatrixToVector(m: Matrix): number[] {
  return m.map((row) => row[0]);
}

