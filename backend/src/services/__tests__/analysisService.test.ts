import { analyzeDocument, toAnalysisResponse } from '../analysisService';

const BLIND = 'Pacijent je slep na oba oka. Uputstvo: beleži vrednosti glikemije.';
const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('analysisService', () => {
  it('reports findings with high confidence', async () => {
    const result = await analyzeDocument({ documentText: BLIND, documentType: 'medical' });
    expect(result.anomalies.map((a) => a.type)).toEqual(['impossible_instruction']);
    expect(result.confidence).toBe(0.95);
    expect(result.modelUsed).toBe('ai-mock-v1 (demo) | Production: OpenBioLLM-70B + DeepSeek-R1');
  });

  it('reports a clean document with lower confidence', async () => {
    const result = await analyzeDocument({ documentText: '', documentType: 'medical' });
    expect(result.anomalies).toEqual([]);
    expect(result.confidence).toBe(0.85);
  });

  it('never reports less than the latency floor', async () => {
    const started = Date.now();
    const result = await analyzeDocument({ documentText: BLIND, documentType: 'medical' }, { minLatencyMs: 100 });
    expect(result.processingTimeMs).toBeGreaterThanOrEqual(100);
    expect(Number.isInteger(result.processingTimeMs)).toBe(true);
    expect(Date.now() - started).toBeGreaterThanOrEqual(95);
  });

  it('keeps the 100 ms floor when a lower one is requested', async () => {
    const started = Date.now();
    const result = await analyzeDocument({ documentText: 'x', documentType: 'medical' }, { minLatencyMs: 0 });
    expect(result.processingTimeMs).toBeGreaterThanOrEqual(100);
    expect(Date.now() - started).toBeGreaterThanOrEqual(95);
  });

  it('raises the floor when a higher one is requested', async () => {
    const result = await analyzeDocument({ documentText: BLIND, documentType: 'medical' }, { minLatencyMs: 150 });
    expect(result.processingTimeMs).toBeGreaterThanOrEqual(150);
  });

  it('waits per request rather than serialising concurrent calls', async () => {
    const started = Date.now();
    const results = await Promise.all(
      Array.from({ length: 5 }, () => analyzeDocument({ documentText: BLIND, documentType: 'medical' }, { minLatencyMs: 100 }))
    );
    expect(Date.now() - started).toBeLessThan(400);
    expect(new Set(results.map((r) => r.requestId)).size).toBe(5);
  });

  it('stamps a fresh uuid and a UTC timestamp', async () => {
    const result = await analyzeDocument({ documentText: BLIND, documentType: 'medical' });
    expect(result.requestId).toMatch(UUID_V4);
    expect(result.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });

  it('renders the wire response in snake case', () => {
    const response = toAnalysisResponse({
      requestId: 'req-1',
      timestamp: '2026-01-01T00:00:00.000Z',
      anomalies: [
        {
          type: 'data_conflict',
          severity: 'warning',
          title: 't',
          description: 'd',
          evidence: ['e'],
          recommendation: 'r',
        },
      ],
      processingTimeMs: 120,
      modelUsed: 'm',
      confidence: 0.95,
    });
    expect(response).toEqual({
      request_id: 'req-1',
      timestamp: '2026-01-01T00:00:00.000Z',
      anomalies_found: 1,
      anomalies: [
        {
          type: 'data_conflict',
          severity: 'warning',
          title: 't',
          description: 'd',
          evidence: ['e'],
          recommendation: 'r',
          protocol_reference: null,
        },
      ],
      processing_time_ms: 120,
      model_used: 'm',
      confidence: 0.95,
    });
  });
});
