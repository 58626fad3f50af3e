"use client";
import { useState, useEffect, useRef } from 'react';
import dynamic from 'next/dynamic';
import type { Node as RFNode, Edge as RFEdge } from '@xyflow/react';
import ReactMarkdown from 'react-markdown';
import ChainForm from '@/app/components/ChainForm';
import { clearStoredResult, loadStoredResult, saveStoredResult } from '@/lib/client/storage';
import { readChainStream } from '@/lib/client/stream';
import { errorMessage } from '@/lib/errors';
import { CHAIN_STEPS, type ChainRequest, type ChainResult, type ChainRun, type ChainStep, type StepStatus } from '@/lib/types';

const ReactFlow = dynamic(() => import('@xyflow/react').then(m=>m.ReactFlow), { ssr: false });
const Background = dynamic(() => import('@xyflow/react').then(m=>m.Background), { ssr: false });
const Controls = dynamic(() => import('@xyflow/react').then(m=>m.Controls), { ssr: false });

type FlowNode = RFNode<{ label: string }>;

type ResultTab = Exclude<keyof ChainResult, 'topic'>;

const TABS: { key: ResultTab; label: string }[] = [
  { key: 'polishedContent', label: 'Polished' },
  { key: 'content', label: 'Draft' },
  { key: 'outline', label: 'Outline' },
  { key: 'topics', label: 'Topics' },
];

function stageLabel(step: ChainStep) {
  switch (step) {
    case 'topics': return 'Topics';
    case 'outline': return 'Outline';
    case 'content': return 'Draft';
    case 'polish': return 'Polish';
  }
}

function statusClass(status: StepStatus) {
  switch (status) {
    case 'done': return 'bg-green-200';
    case 'error': return 'bg-red-200';
    case 'running': return 'bg-yellow-200';
    case 'idle': return 'bg-gray-100';
  }
}

function toFlow(statuses: Record<ChainStep, StepStatus>): { nodes: FlowNode[]; edges: RFEdge[] } {
  const nodes: FlowNode[] = CHAIN_STEPS.map((step, idx) => ({
    id: step,
    data: { label: `${idx + 1}. ${stageLabel(step)}` },
    position: { x: 40 + idx * 180, y: 80 },
    className: statusClass(statuses[step]),
  }));
  const edges: RFEdge[] = CHAIN_STEPS.slice(1).map((step, idx) => ({ id: `e${idx}`, source: CHAIN_STEPS[idx], target: step }));
  return { nodes, edges };
}

const ALL_IDLE: Record<ChainStep, StepStatus> = { topics: 'idle', outline: 'idle', content: 'idle', polish: 'idle' };
const ALL_DONE: Record<ChainStep, StepStatus> = { topics: 'done', outline: 'done', content: 'done', polish: 'done' };

export default function Home() {
  const [request, setRequest] = useState<ChainRequest>({ domain: '', audience: '' });
  const [running, setRunning] = useState(false);
  const [statuses, setStatuses] = useState<Record<ChainStep, StepStatus>>(ALL_IDLE);
  const [result, setResult] = useState<ChainResult | null>(null);
  const [savedAt, setSavedAt] = useState<number | null>(null);
  const [tab, setTab] = useState<ResultTab>('polishedContent');
  const [error, setError] = useState<string | null>(null);
  const [aborter, setAborter] = useState<AbortController | null>(null);
  // realtime logs
  const [logs, setLogs] = useState<string[]>([]);
  const loggedRef = useRef<Set<ChainStep>>(new Set());
  const logBoxRef = useRef<HTMLPreElement | null>(null);

  // restore the last result on mount
  useEffect(() => {
    try {
      const stored = loadStoredResult(window.localStorage);
      if (stored) {
        setRequest(stored.request);
        setResult(stored.result);
        setSavedAt(stored.savedAt);
        setStatuses(ALL_DONE);
      }
    } catch (e: unknown) {
      appendLog(`Could not read the saved result: ${errorMessage(e)}`);
    }
  }, []);

  useEffect(() => {
    if (logBoxRef.current) {
      logBoxRef.current.scrollTop = logBoxRef.current.scrollHeight;
    }
  }, [logs]);

  function appendLog(line: string) {
    const ts = new Date().toLocaleTimeString();
    setLogs((prev) => [...prev, `[${ts}] ${line}`]);
  }

  function applyRun(run: ChainRun) {
    const next = { ...ALL_IDLE };
    run.steps.forEach((s) => { next[s.step] = s.status; });
    setStatuses(next);
    run.steps.forEach((s) => {
      if (s.status === 'done' && !loggedRef.current.has(s.step)) {
        loggedRef.current.add(s.step);
        const words = (s.output || '').split(/\s+/).filter(Boolean).length;
        appendLog(`Finished ${stageLabel(s.step)} (${words} words)`);
      }
    });
  }

  async function run() {
    if (running) return;
    setRunning(true);
    setError(null);
    setResult(null);
    setSavedAt(null);
    setStatuses(ALL_IDLE);
    setLogs([]);
    loggedRef.current = new Set();
    const controller = new AbortController();
    setAborter(controller);
    const submitted = request;
    try {
      const res = await fetch('/api/chain/stream', { method: 'POST', headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(submitted), signal: controller.signal });
      if (!res.ok || !res.body) throw new Error(`Request failed: ${res.status}`);
      const outcome: { result?: ChainResult; failure?: string } = {};
      await readChainStream(res.body, (evt) => {
        if (evt.type === 'update') applyRun(evt.run);
        if (evt.type === 'done') {
          applyRun(evt.run);
          outcome.result = evt.result;
        }
        if (evt.type === 'error') outcome.failure = evt.step ? `Generation failed at the ${stageLabel(evt.step)} step` : 'Generation failed';
      });
      if (outcome.failure) throw new Error(outcome.failure);
      const finished = outcome.result;
      if (!finished) throw new Error('Stream ended without a result');
      setResult(finished);
      setTab('polishedContent');
      try {
        setSavedAt(saveStoredResult(window.localStorage, submitted, finished).savedAt);
      } catch (e: unknown) {
        appendLog(`Could not save the result: ${errorMessage(e)}`);
      }
      appendLog('Chain finished');
    } catch (e: unknown) {
      if (controller.signal.aborted) {
        appendLog('Run cancelled');
      } else {
        const message = errorMessage(e);
        appendLog(`Error: ${message}`);
        setError(message);
      }
    } finally {
      setRunning(false);
      setAborter(null);
    }
  }

  function stopRun() {
    if (aborter) aborter.abort();
  }

  function clearSaved() {
    try {
      clearStoredResult(window.localStorage);
      setSavedAt(null);
    } catch (e: unknown) {
      appendLog(`Could not clear the saved result: ${errorMessage(e)}`);
    }
  }

  const { nodes, edges } = toFlow(statuses);

  return (
    <div className="flex h-screen">
      <div className="w-1/4 border-r p-3 space-y-3">
        <h2 className="font-bold">Input</h2>
        <ChainForm value={request} running={running} onChange={setRequest} onSubmit={() => void run()} onStop={stopRun} />
        {savedAt !== null && (
          <div className="text-xs text-gray-600 space-y-1">
            <div>Saved in this browser at {new Date(savedAt).toLocaleString()}</div>
            <button className="border px-2 py-1" onClick={clearSaved}>Clear saved result</button>
          </div>
        )}
      </div>

      <div className="w-3/4 p-3 flex flex-col">
        <div className="h-48 border mb-3 relative">
          <ReactFlow nodes={nodes} edges={edges} fitView>
            <Background />
            <Controls />
          </ReactFlow>
        </div>
        <div className="mb-3">
          <h2 className="font-bold mb-2">Progress</h2>
          <pre ref={logBoxRef} className="whitespace-pre-wrap text-xs p-2 bg-black text-green-200 border h-24 overflow-auto">{logs.join('\n')}</pre>
        </div>
        {error && <div role="alert" className="mb-3 border border-red-300 bg-red-50 text-red-700 p-2 text-sm">{error}</div>}
        {result && <div className="mb-2 text-sm">Topic: <span className="font-semibold">{result.topic}</span></div>}
        <div className="flex space-x-2 mb-2">
          {TABS.map(t => (
            <button key={t.key} className={`px-3 py-1 border ${tab===t.key?'bg-gray-200':''}`} onClick={()=>setTab(t.key)} disabled={!result}>{t.label}</button>
          ))}
        </div>
        <div className="flex-1 overflow-auto prose prose-sm max-w-none bg-white border p-3 rounded shadow-inner">
          {result ? <ReactMarkdown>{result[tab]}</ReactMarkdown> : <div className="text-gray-500 text-sm">The finished post will appear here</div>}
        </div>
      </div>
    </div>
  );
}
