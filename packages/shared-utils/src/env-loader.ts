import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { parse } from 'dotenv';

// 뒤에 오는 파일이 앞 파일 값을 덮어쓴다
const ENV_FILE_NAMES = ['.env', '.env.local'] as const;

/**
 * workspaces 필드가 있는 package.json 을 가진 디렉터리인지
 */
function isWorkspaceRoot(dir: string): boolean {
  const packageJsonPath = join(dir, 'package.json');
  if (!existsSync(packageJsonPath)) return false;

  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
    return typeof parsed === 'object' && parsed !== null && 'workspaces' in parsed;
  } catch {
    // 깨진 package.json은 루트 후보에서 제외
    return false;
  }
}

export function findWorkspaceRoot(startDir: string): string | null {
  for (let current = startDir; ; current = dirname(current)) {
    if (isWorkspaceRoot(current)) return current;
    if (dirname(current) === current) return null;
  }
}

/**
 * 워크스페이스 루트와 실행 디렉터리의 .env 파일을 process.env 에 반영
 *
 * 셸에서 주입한 값은 덮어쓰지 않는다. 파일끼리는 나중 파일(.env.local, 하위 디렉터리)이 우선.
 *
 * @returns 실제로 읽은 파일 경로
 */
export function loadWorkspaceEnv(cwd: string = process.cwd()): string[] {
  const workspaceRoot = findWorkspaceRoot(cwd);
  if (!workspaceRoot) return [];

  const dirs = cwd === workspaceRoot ? [workspaceRoot] : [workspaceRoot, cwd];
  const files = dirs.flatMap((dir) => ENV_FILE_NAMES.map((name) => join(dir, name))).filter(existsSync);

  const fromFile = new Set<string>();
  for (const file of files) {
    for (const [key, value] of Object.entries(parse(readFileSync(file, 'utf8')))) {
      if (process.env[key] !== undefined && !fromFile.has(key)) continue;
      process.env[key] = value;
      fromFile.add(key);
    }
  }

  return files;
}

loadWorkspaceEnv();
