import './App.css';
import SearchPage from './pages/search';

function App() {
  return <SearchPage />;
}

export default App
