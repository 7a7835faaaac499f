import type { Selection } from '../engine/selection';

export type PeerMode = Selection['peerMode'];

interface Props {
  banks: string[];
  selectedBank: string;
  peerCount: string;
  peerMode: PeerMode;
  onSelectBank: (bank: string) => void;
  onPeerCountChange: (value: string) => void;
  onPeerModeChange: (mode: PeerMode) => void;
}

const BankSelector = ({
  banks,
  selectedBank,
  peerCount,
  peerMode,
  onSelectBank,
  onPeerCountChange,
  onPeerModeChange,
}: Props) => (
  <div className="card">
    <div>
      <div className="eyebrow">Peer group</div>
      <h3>Pick a bank and its comparison set</h3>
    </div>
    <div className="form-row" style={{ alignItems: 'flex-end' }}>
      <div className="field">
        <label htmlFor="bank">Select a bank</label>
        <select id="bank" value={selectedBank} onChange={(e) => onSelectBank(e.target.value)}>
          <option value="" disabled>
            Select bank...
          </option>
          {banks.map((b) => (
            <option key={b} value={b}>
              {b}
            </option>
          ))}
        </select>
      </div>
      <div className="field">
        <label htmlFor="peer-count">Neighbours on each side</label>
        <input
          id="peer-count"
          type="number"
          min={1}
          step={1}
          value={peerCount}
          disabled={peerMode === 'whole-market'}
          onChange={(e) => onPeerCountChange(e.target.value)}
        />
      </div>
      <label className="checkbox">
        <input
          type="checkbox"
          checked={peerMode === 'whole-market'}
          onChange={(e) => onPeerModeChange(e.target.checked ? 'whole-market' : 'adjacent-by-name')}
        />
        Compare with the whole market
      </label>
    </div>
    <p className="muted">Peers are the banks next to the selection in alphabetical order.</p>
  </div>
);

export default BankSelector;
