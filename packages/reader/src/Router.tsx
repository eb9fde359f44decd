import { Link, Route, Router, Switch } from "wouter";
import { OpenPdfPage } from "./pages/OpenPdfPage";
import { PdfPage } from "./pdf/PdfPage";

function NotFound() {
  return (
    <div className="min-h-screen flex flex-col items-center justify-center gap-2 text-gray-500">
      Page not found
      <Link href="/" className="text-blue-600 hover:underline">
        Open a PDF
      </Link>
    </div>
  );
}

export function AppRouter() {
  return (
    <Router>
      <Switch>
        <Route path="/" component={OpenPdfPage} />
        <Route path="/pdf" component={PdfPage} />
        <Route>
          <NotFound />
        </Route>
      </Switch>
    </Router>
  );
}
