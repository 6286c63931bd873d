import { Navigate, Route, Routes } from 'react-router-dom';
import AppShell from './components/AppShell';
import AboutPage from './pages/AboutPage';
import CategoryAnalysisPage from './pages/CategoryAnalysisPage';

const App = () => (
  <Routes>
    <Route element={<AppShell />}>
      <Route index element={<Navigate to="/analysis" replace />} />
      <Route path="/analysis" element={<CategoryAnalysisPage />} />
      <Route path="/about" element={<AboutPage />} />
      <Route path="*" element={<Navigate to="/analysis" replace />} />
    </Route>
  </Routes>
);

export default App;
