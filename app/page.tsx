/**
 * Homepage - API Documentation
 */

type Param = { name: string; note: string };

type Endpoint = {
  method: 'GET' | 'POST';
  path: string;
  summary: string;
  params?: Param[];
  example?: string;
  notes?: string;
};

const ENDPOINTS: Endpoint[] = [
  {
    method: 'GET',
    path: '/api/top-models',
    summary: 'Ranked model leaderboard from the latest pipeline run',
    params: [
      { name: 'n', note: '(optional): Top-N rows (default: 15, clamped to 1-200)' },
      { name: 'v2', note: '(optional): 0 ranks by mentions (v1); anything else by score_v2' },
      { name: 'sort', note: '(optional): mentions | score_v2 | vote_score | unique_threads | avg_doc_score | avg_vote | canonical_model' },
    ],
    example: '/api/top-models?n=5&v2=1',
    notes: '404 until the pipeline has run once. ETag changes only when the stats do.',
  },
  {
    method: 'POST',
    path: '/api/import',
    summary: 'Add a batch of threads to the document store',
    params: [
      { name: 'body', note: '{ threads: [...] }, a list of threads, one thread, or a native [post, comments] listing pair' },
      { name: 'source', note: '(optional query): file name recorded for the batch' },
    ],
  },
  {
    method: 'POST',
    path: '/api/pipeline',
    summary: 'Run extraction, canonicalization and scoring over every stored thread',
    notes: '409 while another run is in progress.',
  },
  {
    method: 'GET',
    path: '/api/health',
    summary: 'Store counts and the last run summary',
    example: '/api/health',
  },
];

const COLUMNS = ['rank', 'canonical_model', 'mentions', 'unique_threads', 'vote_score', 'score_v2', 'avg_doc_score', 'avg_vote'];

function EndpointCard({ endpoint }: { endpoint: Endpoint }) {
  return (
    <div style={{ background: '#f5f5f5', padding: '20px', borderRadius: '8px', marginBottom: '16px' }}>
      <h3 style={{ fontSize: '18px', marginBottom: '8px' }}>
        <code>{endpoint.method} {endpoint.path}</code>
      </h3>
      <p style={{ color: '#666', marginBottom: '12px' }}>{endpoint.summary}</p>
      {endpoint.params && (
        <>
          <p style={{ fontSize: '14px', marginBottom: '8px' }}><strong>Parameters:</strong></p>
          <ul style={{ fontSize: '14px', color: '#666', marginLeft: '20px' }}>
            {endpoint.params.map(p => (
              <li key={p.name}><code>{p.name}</code> {p.note}</li>
            ))}
          </ul>
        </>
      )}
      {endpoint.example && (
        <p style={{ fontSize: '14px', marginTop: '12px' }}>
          <strong>Example:</strong>{' '}
          <a href={endpoint.example} style={{ color: '#0070f3' }}>{endpoint.example}</a>
        </p>
      )}
      {endpoint.notes && (
        <p style={{ fontSize: '12px', color: '#999', marginTop: '8px' }}>{endpoint.notes}</p>
      )}
    </div>
  );
}

export default function Home() {
  return (
    <div style={{ maxWidth: '800px', margin: '0 auto', padding: '40px 20px', fontFamily: 'system-ui, sans-serif' }}>
      <h1 style={{ fontSize: '32px', marginBottom: '10px' }}>🔊 ThreadTally API</h1>
      <p style={{ color: '#666', marginBottom: '40px' }}>
        Speaker model mentions from discussion threads, ranked by count and votes
      </p>

      <section style={{ marginBottom: '40px' }}>
        <h2 style={{ fontSize: '24px', marginBottom: '16px' }}>📡 Available Endpoints</h2>
        {ENDPOINTS.map(e => (
          <EndpointCard key={`${e.method} ${e.path}`} endpoint={e} />
        ))}
      </section>

      <section style={{ marginBottom: '40px' }}>
        <h2 style={{ fontSize: '24px', marginBottom: '16px' }}>📊 Output Columns</h2>
        <p style={{ fontSize: '14px', color: '#666' }}>
          {COLUMNS.map((c, i) => (
            <span key={c}>{i > 0 && ', '}<code>{c}</code></span>
          ))}
        </p>
        <p style={{ fontSize: '14px', color: '#666', marginTop: '12px' }}>
          <code>score_v2</code> = 100 x (0.5 x scaled ln(1 + mentions) + 0.5 x scaled signed ln(1 + vote_score)),
          min-max scaled across the models of one run.
        </p>
      </section>

      <footer style={{ marginTop: '60px', paddingTop: '20px', borderTop: '1px solid #eee', fontSize: '12px', color: '#999', textAlign: 'center' }}>
        <p>ThreadTally - local thread analysis, no crawling</p>
      </footer>
    </div>
  );
}
