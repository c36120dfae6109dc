/**
 * POM 조상 문서 처리
 *
 * POM의 parent와 dependencyManagement 항목을 찾아 해당 POM을 같은 저장소에서
 * 내려받아 매니페스트에 등록하고, parent와 BOM은 재귀적으로 따라간다.
 * 파싱할 수 없는 POM은 "더 이상 조상 없음"으로 취급한다.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import logger from '../../utils/logger';
import { Coordinate } from './coordinate';
import { MalformedCoordinateError } from './errors';

/** 재귀 깊이 제한 (순환 parent 방지) */
export const MAX_ANCESTOR_DEPTH = 50;

/** 프로퍼티 치환 반복 제한 */
const MAX_PROPERTY_ITERATIONS = 10;

const BOM_SUFFIX = '-bom';

const PROPERTIES_PATH = '/project/properties';
const PARENT_PATH = '/project/parent';
const MANAGED_DEPENDENCY_PATH = '/project/dependencyManagement/dependencies/dependency';

/** POM을 내려받아 등록하는 쪽 (ArtifactResolver) */
export interface DescriptionResolver {
  /**
   * 좌표의 POM을 저장소에서 내려받아 매니페스트에 등록
   * @returns POM 내용, 저장소에 없으면 undefined
   */
  resolveDescription(coordinate: Coordinate, repository: string): Promise<Buffer | undefined>;
}

/** POM에서 찾은 조상 참조 */
export interface AncestorReference {
  kind: 'parent' | 'managed';
  groupId: string;
  artifactId: string;
  version: string;
}

/** 문서 하나를 순회하는 동안의 상태 (문서마다 새로 생성) */
interface PomWalkState {
  path: string[];
  text: string;
  properties: Map<string, string>;
  project: Partial<Record<'groupId' | 'artifactId' | 'version', string>>;
  parent: Partial<Record<'groupId' | 'version', string>>;
  current: Partial<Record<'groupId' | 'artifactId' | 'version', string>>;
  references: AncestorReference[];
}

/** 순서 보존 모드 파서 옵션 (파싱 후 시작/종료 이벤트처럼 순회) */
const PARSER_OPTIONS = {
  preserveOrder: true,
  ignoreAttributes: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  removeNSPrefix: true,
  parseTagValue: false,
  trimValues: true,
} as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCoordinateField(name: string): name is 'groupId' | 'artifactId' | 'version' {
  return name === 'groupId' || name === 'artifactId' || name === 'version';
}

function startElement(state: PomWalkState, name: string): void {
  state.path.push(name);
  state.text = '';
}

function endElement(state: PomWalkState, name: string): void {
  const current = '/' + state.path.join('/');
  const parentPath = '/' + state.path.slice(0, -1).join('/');

  if (parentPath === PROPERTIES_PATH) {
    state.properties.set(name, state.text);
  } else if (parentPath === '/project' && isCoordinateField(name)) {
    state.project[name] = state.text;
  } else if ((parentPath === PARENT_PATH || parentPath === MANAGED_DEPENDENCY_PATH) && isCoordinateField(name)) {
    state.current[name] = state.text;
    if (parentPath === PARENT_PATH && name !== 'artifactId') {
      state.parent[name] = state.text;
    }
  } else if (current === PARENT_PATH || current === MANAGED_DEPENDENCY_PATH) {
    state.references.push({
      kind: current === PARENT_PATH ? 'parent' : 'managed',
      groupId: state.current.groupId ?? '',
      artifactId: state.current.artifactId ?? '',
      version: state.current.version ?? '',
    });
    state.current = {};
  }

  state.path.pop();
  state.text = '';
}

/**
 * 순서 보존 트리를 명시적인 경로 스택으로 순회
 */
function walk(nodes: unknown, state: PomWalkState): void {
  if (!Array.isArray(nodes)) return;

  for (const node of nodes) {
    if (!isRecord(node)) continue;

    for (const [key, value] of Object.entries(node)) {
      if (key === ':@') continue;
      if (key === '#text') {
        state.text += String(value);
        continue;
      }
      startElement(state, key);
      walk(value, state);
      endElement(state, key);
    }
  }
}

/**
 * POM 문서를 순회하여 조상 참조와 프로퍼티 추출
 * 올바른 XML이 아니면 undefined
 */
export function readPom(
  contents: Buffer | string
): { references: AncestorReference[]; properties: Map<string, string> } | undefined {
  const xml = contents.toString();
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    logger.debug('POM XML 검증 실패', { error: validation.err.msg, line: validation.err.line });
    return undefined;
  }

  let tree: unknown;
  try {
    // 문서마다 파서를 새로 생성
    tree = new XMLParser(PARSER_OPTIONS).parse(xml);
  } catch (error) {
    logger.debug('POM XML 파싱 실패', { error: error instanceof Error ? error.message : String(error) });
    return undefined;
  }

  const state: PomWalkState = {
    path: [],
    text: '',
    properties: new Map(),
    project: {},
    parent: {},
    current: {},
    references: [],
  };
  walk(tree, state);

  // 프로젝트 자기 참조 (groupId/version은 parent에서 상속 가능)
  const properties = new Map(state.properties);
  const groupId = state.project.groupId ?? state.parent.groupId;
  const version = state.project.version ?? state.parent.version;
  const selfReferences: Record<string, string | undefined> = {
    groupId,
    artifactId: state.project.artifactId,
    version,
    'parent.groupId': state.parent.groupId,
    'parent.version': state.parent.version,
  };
  for (const [key, value] of Object.entries(selfReferences)) {
    if (value === undefined) continue;
    for (const prefix of ['project.', 'pom.']) {
      if (!properties.has(prefix + key)) {
        properties.set(prefix + key, value);
      }
    }
  }

  return { references: state.references, properties };
}

/**
 * 프로퍼티 치환 (${...} 형식)
 * 알 수 없는 프로퍼티는 그대로 둔다
 */
export function resolveProperty(value: string, properties: ReadonlyMap<string, string>): string {
  if (!value) return value;

  let resolved = value;
  let iterations = 0;

  while (resolved.includes('${') && iterations < MAX_PROPERTY_ITERATIONS) {
    const before = resolved;
    resolved = resolved.replace(/\$\{([^}]+)\}/g, (match: string, key: string) => properties.get(key) ?? match);

    if (resolved === before) break; // 더 이상 치환할 것이 없음
    iterations++;
  }

  return resolved;
}

export class PomHandler {
  /** 이미 조상을 따라간 POM (저장소 + 좌표) */
  private readonly expanded: Set<string> = new Set();

  constructor(private readonly resolver: DescriptionResolver) {}

  /**
   * POM이 참조하는 parent/BOM 체인을 등록
   * @param pom POM 내용
   * @param repository POM을 내려받은 저장소
   * @param depth 현재 재귀 깊이
   */
  async addAncestors(pom: Buffer, repository: string, depth = 0): Promise<void> {
    if (depth >= MAX_ANCESTOR_DEPTH) {
      logger.warn('POM 조상 재귀 깊이 제한 도달', { repository, depth });
      return;
    }

    const parsed = readPom(pom);
    if (!parsed) return;

    await Promise.all(
      parsed.references.map((reference) => this.followReference(reference, parsed.properties, repository, depth))
    );
  }

  private async followReference(
    reference: AncestorReference,
    properties: ReadonlyMap<string, string>,
    repository: string,
    depth: number
  ): Promise<void> {
    let coordinate: Coordinate;
    try {
      coordinate = Coordinate.of(
        resolveProperty(reference.groupId, properties),
        resolveProperty(reference.artifactId, properties),
        resolveProperty(reference.version, properties)
      );
    } catch (error) {
      if (error instanceof MalformedCoordinateError) {
        logger.debug('불완전한 POM 참조 무시', { reference: error.id, repository });
        return;
      }
      throw error;
    }

    const contents = await this.resolver.resolveDescription(coordinate, repository);
    if (!contents) return;

    const recurse = reference.kind === 'parent' || coordinate.name.endsWith(BOM_SUFFIX);
    if (!recurse) return;

    const key = repository + coordinate.toString();
    if (this.expanded.has(key)) return;
    this.expanded.add(key);

    await this.addAncestors(contents, repository, depth + 1);
  }
}
