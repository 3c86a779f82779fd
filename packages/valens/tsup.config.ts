import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    // Main entry point (composition, Result, validation errors, namespaces)
    index: 'src/index.ts',

    // =========================================================================
    // Supporting containers
    // =========================================================================
    function: 'src/function/index.ts',
    result: 'src/result.ts',
    option: 'src/option/index.ts',
    reader: 'src/reader/index.ts',
    monoid: 'src/monoid/index.ts',

    // =========================================================================
    // Validation
    // =========================================================================
    validation: 'src/validation/index.ts',
    validate: 'src/validate/index.ts',

    // =========================================================================
    // Optics
    // =========================================================================
    lens: 'src/lens/index.ts',
    optional: 'src/optional/index.ts',
    prism: 'src/prism/index.ts',
    iso: 'src/iso/index.ts',

    // =========================================================================
    // Codecs
    // =========================================================================
    codec: 'src/codec/index.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  clean: true,
  splitting: false,
  sourcemap: true,
  minify: true,
});
