import { describe, it, expect } from 'vitest';

describe('distclean smoke', () => {
    it('loads clean', async () => { const m = await import('../src/commands/clean'); expect(m.execute).toBeDefined(); });
    it('loads remover', async () => { const m = await import('../src/clean/remover'); expect(m.CascadingRemover).toBeDefined(); });
    it('loads planner', async () => { const m = await import('../src/clean/planner'); expect(m.RemovalPlan).toBeDefined(); });
    it('loads manual dister', async () => { const m = await import('../src/dist/manual'); expect(m.ManualDister).toBeDefined(); });
    it('loads index', async () => { const m = await import('../src/index'); expect(m.clean).toBeDefined(); });
    it('clean export', async () => { const m = await import('../src/index'); expect(typeof m.clean).toBe('function'); });
    it('classifier export', async () => { const m = await import('../src/index'); expect(m.classifyBinaries).toBeDefined(); });
    it('dist matcher export', async () => { const m = await import('../src/index'); expect(m.matchDistArtifacts).toBeDefined(); });
    it('product export', async () => { const m = await import('../src/index'); expect(m.cleanProducts).toBeDefined(); });
    it('config export', async () => { const m = await import('../src/index'); expect(m.loadProjectConfig).toBeDefined(); });
    it('dister export', async () => { const m = await import('../src/index'); expect(m.createDister).toBeDefined(); });
});
