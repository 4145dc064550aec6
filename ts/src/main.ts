import { ExitCode, runSimulation } from './simulation';

const OUTCOME: Record<ExitCode, string> = {
  [ExitCode.Clean]: 'Simulation ended',
  [ExitCode.InitFailure]: 'Could not start the simulation (see console)',
  [ExitCode.RuntimeFailure]: 'Simulation stopped on an error (see console)',
};

async function main(): Promise<void> {
  document.title = 'Black Hole Simulation';
  const canvas = document.getElementById('canvas');
  const overlay = document.getElementById('overlay');
  if (!(canvas instanceof HTMLCanvasElement) || !overlay) {
    throw new Error('main: index.html must provide #canvas and #overlay');
  }

  overlay.textContent = 'W/S: move forward/back | A/D: strafe';
  const code = await runSimulation({ canvas, keyTarget: canvas, closeTarget: window });
  overlay.textContent = `${OUTCOME[code]} (exit code ${code})`;
}

main().catch((e: unknown) => console.error('[EventHorizon] Fatal:', e));
