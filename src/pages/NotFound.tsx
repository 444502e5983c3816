import { useLocation, Link } from "react-router-dom";

const NotFound = () => {
  const location = useLocation();

  return (
    <div className="h-screen flex items-center justify-center bg-background">
      <div className="text-center">
        <h1 className="text-4xl font-bold mb-2">404</h1>
        <p className="text-sm text-muted-foreground mb-4">
          No page at <span className="font-mono">{location.pathname}</span>
        </p>
        <Link to="/" className="text-sm text-primary underline">
          Back to the sieve analysis
        </Link>
      </div>
    </div>
  );
};

export default NotFound;
