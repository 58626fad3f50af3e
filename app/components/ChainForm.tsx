"use client";
import type React from 'react';
import type { ChainRequest } from '@/lib/types';
import { ChainRequestSchema } from '@/lib/validation';

type Props = {
  value: ChainRequest;
  running: boolean;
  onChange: (next: ChainRequest) => void;
  onSubmit: () => void;
  onStop: () => void;
};

export default function ChainForm({ value, running, onChange, onSubmit, onStop }: Props) {
  const valid = ChainRequestSchema.safeParse(value).success;

  function submit(e: React.FormEvent<HTMLFormElement>) {
    e.preventDefault();
    if (valid && !running) onSubmit();
  }

  return (
    <form className="space-y-3" onSubmit={submit}>
      <label className="block text-sm" htmlFor="domain">Domain</label>
      <input id="domain" className="w-full border p-2" value={value.domain} onChange={e=>onChange({ ...value, domain: e.target.value })} />
      <label className="block text-sm" htmlFor="audience">Target audience</label>
      <input id="audience" className="w-full border p-2" value={value.audience} onChange={e=>onChange({ ...value, audience: e.target.value })} />
      <div className="flex space-x-2">
        <button type="submit" className="flex-1 bg-blue-600 text-white py-2 disabled:opacity-50" disabled={!valid || running}>{running?'Generating...':'Generate'}</button>
        <button type="button" className="w-28 bg-red-600 text-white py-2 disabled:opacity-50" onClick={onStop} disabled={!running}>Stop</button>
      </div>
    </form>
  );
}
