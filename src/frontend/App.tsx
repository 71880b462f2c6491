import { UpdateBrokerProvider } from './store/index.js';
import { ToastProvider } from './components/Toast.js';
import { CatalogBrowser } from './components/CatalogBrowser.js';
import { AttachmentList } from './components/AttachmentList.js';

/** Reads the case id from `?case=<uuid>`. */
export function caseIdFromSearch(search: string): string | null {
  const id = new URLSearchParams(search).get('case');
  return id && id.trim() ? id.trim() : null;
}

export default function App() {
  const caseId = caseIdFromSearch(window.location.search);

  if (!caseId) {
    return (
      <div className="layout">
        <p className="muted">Open this page with <code>?case=&lt;case id&gt;</code>.</p>
      </div>
    );
  }

  return (
    <ToastProvider>
      <UpdateBrokerProvider>
        <div className="layout">
          <h1>Case {caseId}</h1>
          <div className="grid">
            <CatalogBrowser caseId={caseId} />
            <AttachmentList caseId={caseId} />
          </div>
        </div>
      </UpdateBrokerProvider>
    </ToastProvider>
  );
}
