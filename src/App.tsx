import { useCallback, useEffect, useLayoutEffect, useMemo, useRef, useState } from 'react';
import { baseConfig } from './config/baseConfig';
import { RATIO_CATALOG, RATIO_IDS } from './config/ratioCatalog';
import { GAUGE_STRESS_METRICS, STRESS_METRICS } from './config/stressMetrics';
import type { Dataset } from './domain/dataset';
import { RatioId, StressMetricId } from './domain/enums';
import { type AnalyticsEvent, createEvent } from './engine/events';
import { listBanks } from './engine/loader';
import { AnalyticsController, type AnalysisResult } from './ui/analyticsController';
import BankSelector, { type PeerMode } from './components/BankSelector';
import { type Theme, ThemeContext } from './components/chartColors';
import DataSourcePanel from './components/DataSourcePanel';
import EventLog from './components/EventLog';
import { GaugeGrid, type GaugeItem } from './components/Gauge';
import KeyFinancialsTable from './components/KeyFinancialsTable';
import RatioPanel from './components/RatioPanel';
import StressPanel from './components/StressPanel';
import SummaryPanel from './components/SummaryPanel';

const controller = new AnalyticsController(baseConfig);
const tabs = ['Key Financials', 'Key Metrics', 'CCAR Stress Test', 'Events'];

type Analysis = { result: AnalysisResult; error: null } | { result: null; error: string };

const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

const App = () => {
  const [theme, setTheme] = useState<Theme>('light');
  const [dataset, setDataset] = useState<Dataset | null>(null);
  const [source, setSource] = useState<string | null>(null);
  const [loading, setLoading] = useState(false);
  const [loadError, setLoadError] = useState<string | null>(null);
  const [eventLog, setEventLog] = useState<AnalyticsEvent[]>([]);
  const [selectedBank, setSelectedBank] = useState('');
  const [peerCount, setPeerCount] = useState(String(baseConfig.defaultPeerCount));
  const [peerMode, setPeerMode] = useState<PeerMode>('adjacent-by-name');
  const [ratioId, setRatioId] = useState<RatioId>(RatioId.CoreDeposits);
  const [stressMetricId, setStressMetricId] = useState<StressMetricId>(StressMetricId.Cet1);
  const [activeTab, setActiveTab] = useState<string>('Key Financials');
  // Effects may run twice under StrictMode; these keep the fetch and the log single.
  const initialLoadStarted = useRef(false);
  const loggedAnalysis = useRef<Analysis | null>(null);

  const banks = useMemo(() => (dataset ? listBanks(dataset) : []), [dataset]);

  const adoptDataset = useCallback((next: Dataset, name: string, events: AnalyticsEvent[]) => {
    setDataset(next);
    setSource(name);
    setLoadError(null);
    setSelectedBank(listBanks(next)[0] ?? '');
    setEventLog((prev) => [...prev, ...events]);
  }, []);

  const failLoad = useCallback((err: unknown) => {
    const message = errorMessage(err);
    setLoadError(message);
    setEventLog((prev) => [...prev, createEvent('error', message)]);
  }, []);

  const reload = useCallback(() => {
    setLoading(true);
    controller
      .load()
      .then(({ dataset: loaded, events }) => adoptDataset(loaded, controller.getConfig().dataFile, events))
      .catch(failLoad)
      .finally(() => setLoading(false));
  }, [adoptDataset, failLoad]);

  const handleUpload = useCallback(
    (file: File) => {
      setLoading(true);
      file
        .arrayBuffer()
        .then((bytes) => {
          const { dataset: loaded, events } = controller.loadUpload(bytes, file.name);
          adoptDataset(loaded, file.name, events);
        })
        .catch(failLoad)
        .finally(() => setLoading(false));
    },
    [adoptDataset, failLoad]
  );

  // Before paint and before the charts' passive effects re-read their colours.
  useLayoutEffect(() => {
    document.documentElement.setAttribute('data-theme', theme);
  }, [theme]);

  useEffect(() => {
    if (initialLoadStarted.current) return;
    initialLoadStarted.current = true;
    reload();
  }, [reload]);

  const analysis = useMemo<Analysis | null>(() => {
    if (!dataset || !selectedBank) return null;
    try {
      const result = controller.analyse(dataset, {
        targetBank: selectedBank,
        peerMode,
        peerCount,
        ratioId,
        stressMetricId,
      });
      return { result, error: null };
    } catch (err) {
      return { result: null, error: errorMessage(err) };
    }
  }, [dataset, peerCount, peerMode, ratioId, selectedBank, stressMetricId]);

  useEffect(() => {
    if (!analysis || loggedAnalysis.current === analysis) return;
    loggedAnalysis.current = analysis;
    const events = analysis.error === null ? analysis.result.events : [createEvent('error', analysis.error)];
    setEventLog((prev) => [...prev, ...events]);
  }, [analysis]);

  const { benchmarks, keyFinancials, summaryFields } = controller.getConfig();
  const result = analysis?.result ?? null;

  const stressGauges: GaugeItem[] = result
    ? GAUGE_STRESS_METRICS.map((id) => {
        const figure = result.stressMetrics[id];
        return {
          id,
          title: STRESS_METRICS[id].label,
          value: figure.status === 'ok' ? figure.value : undefined,
          benchmark: benchmarks.stress[id],
          status: result.stressStatus[id],
        };
      })
    : [];

  const ratioGauges: GaugeItem[] = result
    ? RATIO_IDS.map((id) => {
        const outcome = result.keyMetrics[id];
        return {
          id,
          title: RATIO_CATALOG[id].shortLabel,
          value: outcome.status === 'ok' ? outcome.value : undefined,
          benchmark: benchmarks.ratios[id],
          status: result.keyMetricStatus[id],
        };
      })
    : [];

  return (
    <ThemeContext.Provider value={theme}>
      <div className="app-shell">
        <header className="hero">
          <div className="hero-content">
            <div className="eyebrow">Peer-to-peer bank analytics</div>
            <h1>Bank Peer Analytics</h1>
            <p className="muted">Compare a bank's balance-sheet ratios and capital figures with its peers.</p>
            <div className="hero-pills">
              <span className="pill">{banks.length} banks loaded</span>
              {result && <span className="pill">Peer set: {result.peerSet.banks.length} banks</span>}
            </div>
          </div>
          <div className="hero-side">
            <div style={{ display: 'flex', gap: 8, alignItems: 'center' }}>
              <span className="muted" style={{ fontSize: 12 }}>Theme</span>
              <button className="button ghost" onClick={() => setTheme((prev) => (prev === 'light' ? 'dark' : 'light'))}>
                {theme === 'light' ? 'Switch to dark' : 'Switch to light'}
              </button>
            </div>
          </div>
        </header>

        <div className="grid-two">
          <DataSourcePanel source={source} loading={loading} error={loadError} onUpload={handleUpload} onReload={reload} />
          {dataset && (
            <BankSelector
              banks={banks}
              selectedBank={selectedBank}
              peerCount={peerCount}
              peerMode={peerMode}
              onSelectBank={setSelectedBank}
              onPeerCountChange={setPeerCount}
              onPeerModeChange={setPeerMode}
            />
          )}
        </div>

        {analysis?.error && (
          <div className="alert danger" role="alert">
            {analysis.error}
          </div>
        )}

        <div className="tabs">
          {tabs.map((tab) => (
            <button
              key={tab}
              onClick={() => setActiveTab(tab)}
              className={`tab-button ${activeTab === tab ? 'active' : ''}`}
            >
              {tab}
            </button>
          ))}
        </div>

        {result && activeTab === 'Key Financials' && (
          <section className="stack">
            <KeyFinancialsTable records={result.peerSet.records} fields={keyFinancials} selectedBank={selectedBank} />
            <SummaryPanel
              record={result.record}
              fields={summaryFields}
              capitalAdequacy={result.keyMetrics[RatioId.CapitalAdequacy]}
            />
          </section>
        )}

        {result && activeTab === 'Key Metrics' && (
          <section className="stack">
            <RatioPanel
              computation={result.ratio}
              comparison={result.peerComparison}
              selectedBank={selectedBank}
              onSelectRatio={setRatioId}
            />
            <GaugeGrid title="Key Metrics Dashboard" items={ratioGauges} />
          </section>
        )}

        {result && activeTab === 'CCAR Stress Test' && (
          <section className="stack">
            <StressPanel summary={result.stressSummary} selectedBank={selectedBank} onSelectMetric={setStressMetricId} />
            <GaugeGrid title="CCAR Stress Test Analysis" items={stressGauges} />
          </section>
        )}

        {activeTab === 'Events' && (
          <section className="stack">
            <EventLog events={eventLog} onClear={() => setEventLog([])} />
          </section>
        )}
      </div>
    </ThemeContext.Provider>
  );
};

export default App;
