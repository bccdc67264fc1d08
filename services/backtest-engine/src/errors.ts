/**
 * 백테스트 에러 클래스
 *
 * 입력/설정 에러는 모두 시뮬레이션 시작 전에 던져진다.
 * 통계 계산상의 퇴화 케이스(분산 0, 손실 거래 없음 등)는 지표 계산기에서
 * 기본값으로 흡수하며 에러로 올라오지 않는다.
 */

export class BacktestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BacktestError';
  }
}

/** 봉 데이터가 비었거나 구조가 잘못됨 */
export class BacktestInputError extends BacktestError {
  barIndex: number | null;

  constructor(message: string, barIndex: number | null = null) {
    super(barIndex === null ? `[input] ${message}` : `[input] ${message} (bar #${barIndex})`);
    this.name = 'BacktestInputError';
    this.barIndex = barIndex;
  }
}

/** 전략 파라미터/실행 설정 조합이 잘못됨 */
export class BacktestConfigError extends BacktestError {
  issues: string[];

  constructor(issues: string[]) {
    super(`[config] ${issues.join('; ')}`);
    this.name = 'BacktestConfigError';
    this.issues = issues;
  }
}
