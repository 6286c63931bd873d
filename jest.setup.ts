import '@testing-library/jest-dom';

// recharts' ResponsiveContainer observes its parent; jsdom ships no ResizeObserver
class MockResizeObserver {
  observe() {}
  unobserve() {}
  disconnect() {}
}

window.ResizeObserver = MockResizeObserver;
