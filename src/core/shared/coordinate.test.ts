import { describe, it, expect } from 'vitest';
import { Coordinate } from './coordinate';
import { MalformedCoordinateError } from './errors';

describe('Coordinate', () => {
  describe('parse', () => {
    it('group:name:version 식별자를 파싱해야 함', () => {
      const coord = Coordinate.parse('com.example:lib:1.0');

      expect(coord.group).toBe('com.example');
      expect(coord.name).toBe('lib');
      expect(coord.version).toBe('1.0');
      expect(coord.snapshotDetail).toBe('');
    });

    it('네 번째 값을 스냅샷 상세값으로 읽어야 함', () => {
      const coord = Coordinate.parse('com.example:lib:1.0-SNAPSHOT:20240101.120000-1');

      expect(coord.version).toBe('1.0-SNAPSHOT');
      expect(coord.snapshotDetail).toBe('20240101.120000-1');
    });

    it('값이 3개보다 적으면 MalformedCoordinateError를 던져야 함', () => {
      expect(() => Coordinate.parse('junit')).toThrow(MalformedCoordinateError);
      expect(() => Coordinate.parse('com.example:lib')).toThrow(MalformedCoordinateError);
    });

    it('빈 값이 있으면 MalformedCoordinateError를 던져야 함', () => {
      expect(() => Coordinate.parse('com.example::1.0')).toThrow(MalformedCoordinateError);
      expect(() => Coordinate.parse(':lib:1.0')).toThrow(MalformedCoordinateError);
    });

    it('에러에 원래 식별자가 포함되어야 함', () => {
      try {
        Coordinate.parse('broken');
        expect.fail('예외가 발생해야 함');
      } catch (error) {
        expect(error).toBeInstanceOf(MalformedCoordinateError);
        if (error instanceof MalformedCoordinateError) {
          expect(error.id).toBe('broken');
          expect(error.code).toBe('MALFORMED_COORDINATE');
        }
      }
    });
  });

  describe('path / filename', () => {
    it('그룹의 점을 슬래시로 바꾼 경로를 반환해야 함', () => {
      expect(Coordinate.parse('org.example.tools:core:2.3.1').path()).toBe('org/example/tools/core/2.3.1');
    });

    it('name-version.ext 파일명을 반환해야 함', () => {
      const coord = Coordinate.parse('com.example:lib:1.0');

      expect(coord.filename('jar')).toBe('lib-1.0.jar');
      expect(coord.filename('pom')).toBe('lib-1.0.pom');
      expect(coord.filename('module')).toBe('lib-1.0.module');
    });

    it('스냅샷 바이너리는 상세값으로 치환해야 함', () => {
      const coord = Coordinate.parse('com.example:lib:1.0-SNAPSHOT:20240101.120000-1');

      expect(coord.filename('jar')).toBe('lib-1.0-20240101.120000-1.jar');
      expect(coord.filename('aar')).toBe('lib-1.0-20240101.120000-1.aar');
    });

    it('스냅샷이라도 pom/module은 치환하지 않아야 함', () => {
      const coord = Coordinate.parse('com.example:lib:1.0-SNAPSHOT:20240101.120000-1');

      expect(coord.filename('pom')).toBe('lib-1.0-SNAPSHOT.pom');
      expect(coord.filename('module')).toBe('lib-1.0-SNAPSHOT.module');
    });

    it('상세값이 없는 스냅샷은 그대로 사용해야 함', () => {
      const coord = Coordinate.parse('com.example:lib:1.0-SNAPSHOT');

      expect(coord.isSnapshot).toBe(true);
      expect(coord.filename('jar')).toBe('lib-1.0-SNAPSHOT.jar');
    });
  });

  describe('pluginMarker', () => {
    it('gradle.plugin. 그룹의 마커 좌표를 반환해야 함', () => {
      const marker = Coordinate.parse('gradle.plugin.org.example.lint:lint-plugin:0.4.0').pluginMarker();

      expect(marker?.toString()).toBe('org.example.lint:org.example.lint.gradle.plugin:0.4.0');
      expect(marker?.filename('pom')).toBe('org.example.lint.gradle.plugin-0.4.0.pom');
    });

    it('일반 그룹은 undefined를 반환해야 함', () => {
      expect(Coordinate.parse('com.example:lib:1.0').pluginMarker()).toBeUndefined();
    });
  });

  it('toString은 스냅샷 상세값을 제외해야 함', () => {
    expect(Coordinate.parse('com.example:lib:1.0-SNAPSHOT:20240101.120000-1').toString()).toBe(
      'com.example:lib:1.0-SNAPSHOT'
    );
    expect(Coordinate.of('com.example', 'lib', '1.0').toString()).toBe('com.example:lib:1.0');
  });
});
