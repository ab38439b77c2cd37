import type { ProgressState } from '../types.js';

let activeProgress: ProgressState | null = null;
const progressStartTimes = new Map<string, number>();
const lastTextPercent = new Map<string, number>();

export function formatDuration(ms: number): string {
  if (!Number.isFinite(ms) || ms < 0) {
    return '--:--';
  }

  const totalSeconds = Math.floor(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  if (hours > 0) {
    return `${hours.toString().padStart(2, '0')}:${minutes.toString().padStart(2, '0')}:${seconds.toString().padStart(2, '0')}`;
  }

  return `${minutes.toString().padStart(2, '0')}:${seconds.toString().padStart(2, '0')}`;
}

/**
 * バイト数を KiB / MiB 単位の短い文字列にします。
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes}B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)}KiB`;
  }
  return `${(bytes / (1024 * 1024)).toFixed(1)}MiB`;
}

function drawProgress(progress: ProgressState) {
  const ratio = Math.min(1, Math.max(0, progress.current / progress.total));
  const percent = (ratio * 100).toFixed(1);
  const width = 30;
  const filled = Math.round(ratio * width);
  const bar = `${'='.repeat(filled)}${'-'.repeat(Math.max(0, width - filled))}`;
  process.stdout.write(`\r${progress.label} [${bar}] ${percent}% (${formatBytes(progress.current)}/${formatBytes(progress.total)}) elapsed ${progress.elapsedText} eta ${progress.etaText}`);
}

function withProgressSafeLog(write: () => void) {
  const hasActiveProgress = process.stdout.isTTY && activeProgress !== null;

  if (hasActiveProgress) {
    process.stdout.write('\n');
  }

  write();

  if (hasActiveProgress && activeProgress !== null) {
    drawProgress(activeProgress);
  }
}

/**
 * 進捗表示を崩さずに情報メッセージを出力します。
 *
 * @param message stdout に出力するメッセージ。
 */
export function logInfo(message: string) {
  withProgressSafeLog(() => {
    process.stdout.write(`${message}\n`);
  });
}

/**
 * 進捗表示を崩さずに警告メッセージを出力します。アップロード自体は成功しているが後続処理が失敗した場合に使います。
 *
 * @param message stderr に出力するメッセージ。
 */
export function logWarn(message: string) {
  withProgressSafeLog(() => {
    process.stderr.write(`[WARNING] ${message}\n`);
  });
}

/**
 * 進捗表示を崩さずにエラーメッセージを出力します。
 *
 * @param message stderr に出力するメッセージ。
 */
export function logError(message: string) {
  withProgressSafeLog(() => {
    process.stderr.write(`${message}\n`);
  });
}

/**
 * TTY では転送バイト数の進捗バーを更新し、非 TTY では 25% ごとにテキスト進捗を出力します。
 *
 * @param label 進捗ラベル。
 * @param current 転送済みバイト数。
 * @param total 全体のバイト数。
 */
export function renderProgress(label: string, current: number, total: number) {
  if (total <= 0) {
    return;
  }

  if (process.stdout.isTTY) {
    const now = Date.now();
    const startMs = progressStartTimes.get(label) ?? now;
    if (!progressStartTimes.has(label)) {
      progressStartTimes.set(label, startMs);
    }

    const elapsedMs = Math.max(0, now - startMs);
    const etaMs = current > 0
      ? (elapsedMs / current) * Math.max(0, total - current)
      : Number.NaN;

    activeProgress = {
      label,
      current,
      total,
      elapsedText: formatDuration(elapsedMs),
      etaText: current >= total ? '00:00' : formatDuration(etaMs),
    };
    drawProgress(activeProgress);
    if (current >= total) {
      process.stdout.write('\n');
      activeProgress = null;
      progressStartTimes.delete(label);
    }
    return;
  }

  const ratio = Math.min(1, Math.max(0, current / total));
  const step = Math.floor(ratio * 4) * 25;
  if (step > (lastTextPercent.get(label) ?? -1)) {
    lastTextPercent.set(label, step);
    logInfo(`${label}: ${formatBytes(current)}/${formatBytes(total)} (${(ratio * 100).toFixed(1)}%)`);
  }
  if (current >= total) {
    lastTextPercent.delete(label);
  }
}

/**
 * 指定したラベルの進捗表示を終了します。転送が途中で失敗した場合も、以降のログが古い進捗バーを再描画しないようにします。
 *
 * @param label 進捗ラベル。
 */
export function clearProgress(label: string) {
  if (activeProgress !== null && activeProgress.label === label) {
    if (process.stdout.isTTY) {
      process.stdout.write('\n');
    }
    activeProgress = null;
  }
  progressStartTimes.delete(label);
  lastTextPercent.delete(label);
}
