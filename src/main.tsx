import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import { BrowserRouter } from 'react-router-dom';
import './index.css';
import App from './App';
import { ArticlesProvider } from './contexts/ArticlesContext';

const container = document.getElementById('root');
if (!container) {
  throw new Error('Missing #root element in index.html');
}

createRoot(container).render(
  <StrictMode>
    <BrowserRouter>
      <ArticlesProvider>
        <App />
      </ArticlesProvider>
    </BrowserRouter>
  </StrictMode>,
);
