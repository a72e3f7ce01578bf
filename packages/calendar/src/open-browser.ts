import { spawn } from 'child_process';

/**
 * Open a URL with the platform's default handler. If no opener is available
 * the URL is printed so it can be pasted into a browser by hand.
 */
export function openInBrowser(url: string): void {
  const [command, args]: [string, string[]] =
    process.platform === 'darwin'
      ? ['open', [url]]
      : process.platform === 'win32'
        ? ['cmd', ['/c', 'start', '""', url]]
        : ['xdg-open', [url]];

  console.log(`[Calendar] Opening consent page in your browser...`);

  const child = spawn(command, args, { stdio: 'ignore', detached: true });
  child.on('error', (error) => {
    console.error(`[Calendar] Could not launch ${command}: ${error.message}`);
    console.log(`Please open this URL in your browser:\n${url}`);
  });
  child.unref();
}
