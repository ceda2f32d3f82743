import { describe, it, expect } from 'vitest';
import { TypeResolver, Importer, isStandardName } from '../src/resolver/type-resolver';
import { CollectingWarningSink } from '../src/warnings';
import { Logger, LogLevel } from '../src/logger';

function quietSink(): CollectingWarningSink {
  return new CollectingWarningSink(2, new Logger(LogLevel.SILENT));
}

function importer(namespace: string, originFiles: string[] = ['geo.hpp']): Importer {
  return { namespace, module: namespace ? namespace.split('::').join('.') : 'root', originFiles: new Set(originFiles) };
}

describe('TypeResolver', () => {
  it('names types of the same namespace by their local path', () => {
    const resolver = new TypeResolver();
    resolver.registerDeclared('geo::Vec', { module: 'geo', space: 'geo', file: 'geo.hpp' });
    resolver.registerDeclared('geo::Mesh::Face', { module: 'geo', space: 'geo', file: 'geo.hpp' });

    expect(resolver.importFor(importer('geo'), 'geo::Vec')).toMatchObject({ token: 'Vec', external: false });
    expect(resolver.importFor(importer('geo'), 'geo::Mesh::Face').token).toBe('Mesh.Face');
    expect(resolver.drainImports()).toEqual([]);
  });

  it('resolves names relative to enclosing namespaces, innermost first', () => {
    const resolver = new TypeResolver();
    resolver.registerDeclared('app::Config', { module: 'app', space: 'app' });
    resolver.registerDeclared('app::ui::Config', { module: 'app.ui', space: 'app::ui' });

    expect(resolver.processReference('Config', 'app::ui::widgets')?.qualifiedName).toBe('app::ui::Config');
    expect(resolver.processReference('Config', 'app')?.qualifiedName).toBe('app::Config');
  });

  it('imports types from other namespaces under a flattened alias', () => {
    const resolver = new TypeResolver();
    resolver.registerDeclared('geo::Vec', { module: 'geo', space: 'geo', file: 'geo.hpp' });
    resolver.registerDeclared('geo::Mesh::Face', { module: 'geo', space: 'geo', file: 'geo.hpp' });

    expect(resolver.importFor(importer('app'), 'geo::Vec')).toEqual({
      token: 'geo_Vec',
      statement: 'from geo cimport Vec as geo_Vec',
      external: false,
      resolved: expect.objectContaining({ qualifiedName: 'geo::Vec' })
    });
    expect(resolver.importFor(importer('app'), 'geo::Mesh::Face').token).toBe('geo_Mesh.Face');
    resolver.importFor(importer('app'), 'geo::Vec');

    expect(resolver.drainImports()).toEqual([
      'from geo cimport Mesh as geo_Mesh',
      'from geo cimport Vec as geo_Vec'
    ]);
    expect(resolver.drainImports()).toEqual([]);
  });

  it('uses the local path for a foreign namespace emitted into the same module', () => {
    const resolver = new TypeResolver();
    resolver.registerDeclared('geo::Vec', { module: 'geo', space: 'geo', file: 'geo.hpp' });
    const global: Importer = { namespace: '', module: 'geo', originFiles: new Set(['geo.hpp']) };

    expect(resolver.importFor(global, 'geo::Vec')).toEqual({
      token: 'Vec',
      external: false,
      resolved: expect.objectContaining({ qualifiedName: 'geo::Vec' })
    });
    expect(resolver.drainImports()).toEqual([]);
  });

  it('maps standard-library and builtin names', () => {
    const resolver = new TypeResolver();

    expect(resolver.importFor(importer('geo'), 'std::vector')).toMatchObject({
      token: 'vector',
      statement: 'from libcpp.vector cimport vector'
    });
    expect(resolver.importFor(importer('geo'), 'uint32_t').statement).toBe('from libc.stdint cimport uint32_t');
    const size = resolver.importFor(importer('geo'), 'std::size_t');
    expect(size.token).toBe('size_t');
    expect(size.statement).toBeUndefined();
    expect(resolver.importFor(importer('geo'), 'bool').token).toBe('bint');
    expect(resolver.drainImports()).toEqual([
      'from libc.stdint cimport uint32_t',
      'from libcpp.vector cimport vector'
    ]);
    expect(isStandardName('std::string')).toBe(true);
    expect(isStandardName('geo::Vec')).toBe(false);
  });

  it('stubs types declared outside the run instead of importing them', () => {
    const sink = quietSink();
    const resolver = new TypeResolver({ warnings: sink });
    resolver.registerDeclared('geo::Handle', { module: 'geo', space: 'geo', file: 'handle.hpp' });
    resolver.registerDeclared('io::Stream', { module: 'io', space: 'io', file: 'stream.hpp' });

    expect(resolver.importFor(importer('geo'), 'geo::Handle')).toMatchObject({ token: 'Handle', external: true });
    expect(resolver.importFor(importer('geo'), 'geo::Handle').external).toBe(true);
    const stream = resolver.importFor(importer('geo'), 'io::Stream');
    expect(stream).toMatchObject({ token: 'io_Stream', external: true });
    expect(stream.statement).toBeUndefined();
    expect(resolver.drainImports()).toEqual([]);
    expect(sink.messages()).toEqual(["'geo::Handle' is declared in handle.hpp, which is not part of this run"]);
  });

  it('imports types declared outside the run when importing everything', () => {
    const resolver = new TypeResolver({ importAll: true });
    resolver.registerDeclared('io::Stream', { module: 'io', space: 'io', file: 'stream.hpp' });

    expect(resolver.importFor(importer('geo'), 'io::Stream')).toMatchObject({
      token: 'io_Stream',
      external: false,
      statement: 'from io cimport Stream as io_Stream'
    });
  });

  it('records unresolved names and warns about each once', () => {
    const sink = quietSink();
    const resolver = new TypeResolver();

    expect(resolver.importFor(importer('geo'), 'geo::detail::Cache').token).toBe('detail.Cache');
    expect(resolver.importFor(importer('geo'), 'Missing').token).toBe('Missing');
    expect(resolver.unknown.has('Missing')).toBe(true);
    expect(resolver.drainUnresolved()).toEqual(['Missing', 'geo::detail::Cache']);
    expect(resolver.drainUnresolved()).toEqual([]);

    resolver.registerDeclared('Missing', { module: 'root', space: '' });
    expect(resolver.unknown.has('Missing')).toBe(false);

    resolver.warnUnresolved(sink);
    resolver.warnUnresolved(sink);
    expect(sink.warnings).toEqual([{ message: "Unresolved type 'geo::detail::Cache'", severity: 2 }]);
  });
});
