export const keyBindings = {
  mode: {
    '1': 'Continuous mode',
    '2': 'Single mode',
    '3': 'Loop mode',
  },
  playback: {
    s: 'Stop current item',
    v: 'Show / hide output',
  },
  library: {
    r: 'Rescan cache',
    h: 'Clear play history',
  },
  general: {
    '?': 'Help',
    q: 'Quit',
  },
} as const;

export function getStatusBarText(): string {
  return '{cyan-fg}[1/2/3]{/cyan-fg} Mode  ' +
         '{cyan-fg}[s]{/cyan-fg} Stop  ' +
         '{cyan-fg}[v]{/cyan-fg} Show/Hide  ' +
         '{cyan-fg}[r]{/cyan-fg} Rescan  ' +
         '{cyan-fg}[h]{/cyan-fg} Clear history  ' +
         '{cyan-fg}[?]{/cyan-fg} Help  ' +
         '{cyan-fg}[q]{/cyan-fg} Quit';
}

export const helpText = `
{bold}Loopcast{/bold}

{cyan-fg}Modes{/cyan-fg}
  1           Continuous: play items back to back
  2           Single: play one item, then stop
  3           Loop: repeat the current item

{cyan-fg}Playback{/cyan-fg}
  s           Stop the current item
  v           Toggle output visibility

{cyan-fg}Library{/cyan-fg}
  r           Rescan the cache directory
  h           Forget which items were played

{cyan-fg}General{/cyan-fg}
  ?           Show this help
  q, Ctrl+C   Quit

Press any key to close
`;
