# Delivery simulator service - admin API, health, metrics (src/run.ts)
# Build: docker build -f Dockerfile.ts .
# Run:   docker run -p 3000:3000 -e DATABASE_URL=postgresql://... -e ADMIN_API_TOKEN=... <image>

FROM node:20-alpine

WORKDIR /app

# Install dependencies (include dev for tsx)
COPY package.json ./
RUN npm install --include=dev

COPY tsconfig.json ./
COPY src ./src

ENV NODE_ENV=production
ENV PORT=3000
EXPOSE 3000

HEALTHCHECK --interval=30s --timeout=5s --start-period=10s --retries=3 \
  CMD wget -qO- http://127.0.0.1:3000/health || exit 1

CMD ["npx", "tsx", "src/run.ts"]
