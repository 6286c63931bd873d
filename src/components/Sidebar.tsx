import { NavLink } from 'react-router-dom';

const navItems = [
  {
    to: '/analysis',
    label: 'Category Analysis',
    icon: (
      <svg viewBox="0 0 24 24" aria-hidden="true">
        <rect x="4" y="12" width="4" height="8" rx="1" />
        <rect x="10" y="6" width="4" height="14" rx="1" />
        <rect x="16" y="9" width="4" height="11" rx="1" />
      </svg>
    ),
  },
  {
    to: '/about',
    label: 'About the Data',
    icon: (
      <svg viewBox="0 0 24 24" aria-hidden="true">
        <circle cx="12" cy="12" r="9" />
        <path d="M12 11v6M12 7v1" strokeWidth="2" strokeLinecap="round" stroke="currentColor" />
      </svg>
    ),
  },
];

const Sidebar = () => (
  <aside className="sidebar">
    <div className="sidebar-logo">WA</div>
    <nav className="sidebar-nav">
      {navItems.map((item) => (
        <NavLink
          key={item.to}
          to={item.to}
          className={({ isActive }) =>
            `sidebar-link${isActive ? ' sidebar-link--active' : ''}`
          }
          aria-label={item.label}
        >
          {item.icon}
        </NavLink>
      ))}
    </nav>
  </aside>
);

export default Sidebar;
