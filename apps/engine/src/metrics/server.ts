import http from 'http';
import { Registry } from 'prom-client';

const TAG = '[metrics]';

// Prometheus scrape endpoint: GET /metrics
export function startMetricsServer(registry: Registry, port: number): Promise<http.Server> {
    const server = http.createServer((req, res) => {
        if (req.method !== 'GET' || req.url !== '/metrics') {
            res.writeHead(404).end();
            return;
        }
        registry.metrics().then(
            (body) => {
                res.writeHead(200, { 'Content-Type': registry.contentType }).end(body);
            },
            (err) => {
                console.error(`${TAG} failed to collect metrics:`, err);
                res.writeHead(500).end();
            },
        );
    });

    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, () => {
            console.log(`${TAG} listening on port ${port}`);
            resolve(server);
        });
    });
}
