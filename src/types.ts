// Core type definitions for the TyIPA generators

/**
 * 一条变音符号定义，对应 `_diacritics.csv` 中的一行。
 *
 * 所有字段都按表格原样保存，不做大小写或空白规范化。
 */
export interface DiacriticRecord {
  /** 分类标签，决定分节标题与代码形态 */
  readonly group: string;
  readonly ipaName: string;
  readonly ipaDescription: string;
  readonly unicodeName: string;
  /** 十六进制码位，不带 `0x` 前缀 */
  readonly unicodeHex: string;
  /** 生成函数名，在一次加载中唯一 */
  readonly generatedName: string;
  /** 以空格分隔的别名列表，可能为空字符串 */
  readonly aliasNames: string;
}

/**
 * 符号名到字符的关联。`name` 形如 `foo` 或 `foo.bar`。
 */
export interface SymbolEntry {
  readonly name: string;
  readonly character: string;
}

// Optional file-backed origin info; used for diagnostics and logs
export interface SourceLocation {
  readonly file: string;
  readonly line?: number;
}

/**
 * 生成器读写的全部路径（均为绝对路径）。
 */
export interface GenerationPaths {
  readonly diacriticTable: string;
  readonly diacriticModule: string;
  readonly diacriticManual: string;
  readonly symbolSource: string;
  readonly symbolDictionary: string;
  /** 手册中 `#import ... as ipa` 引入的包入口 */
  readonly libraryEntry: string;
  /** 手册中提供 `display-diac` 的布局模块 */
  readonly displayLayouts: string;
}

export interface GeneratorContext {
  readonly root: string;
  readonly paths: GenerationPaths;
  /** 写入文件头的生成时间；注入以便测试得到确定输出 */
  readonly now: Date;
}

export type GenerationMode = 'write' | 'check';

export interface OutputStatus {
  readonly file: string;
  readonly state: 'written' | 'up-to-date' | 'stale' | 'missing';
}

export interface GenerationReport {
  readonly inputs: readonly string[];
  readonly outputs: readonly OutputStatus[];
  /** 读入的定义数量（变音符号条数或去重后的符号数） */
  readonly count: number;
}
