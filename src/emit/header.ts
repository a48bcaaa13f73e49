/**
 * 生成文件的统一文件头。
 *
 * 形如：
 * ```
 * /// Accenting functions for the diacritics of the IPA.
 * ///
 * /// This file was auto-generated. ...
 * ///
 * /// File generated on: 2024-05-01T09:30:00
 * /// Definitions included: 42
 * ```
 * 空注释行保留 `/// ` 末尾的空格。
 */

export const TIMESTAMP_PREFIX = '/// File generated on: ';

export interface GeneratedHeader {
  readonly title: string;
  readonly notice: readonly string[];
  readonly generatedAt: Date;
  readonly countLabel: string;
  readonly count: number;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** 本地时间的 ISO 形式，精确到秒，不带时区。 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day}T${time}`;
}

export function renderGeneratedHeader(header: GeneratedHeader): string {
  const lines = [
    `/// ${header.title}`,
    '/// ',
    ...header.notice.map(line => `/// ${line}`),
    '/// ',
    `${TIMESTAMP_PREFIX}${formatTimestamp(header.generatedAt)}`,
    `/// ${header.countLabel}: ${header.count}`,
    '',
  ];
  return lines.join('\n') + '\n';
}

/**
 * 去掉时间戳行，用于比较两次生成的结果。
 */
export function withoutTimestamp(content: string): string {
  return content
    .split('\n')
    .filter(line => !line.startsWith(TIMESTAMP_PREFIX))
    .join('\n');
}
