import type {Server} from 'node:http'

export const createGatewayRuntime = ({
  server,
  host,
  port
}: {
  server: Server
  host: string
  port: number
}) => {
  const start = async () =>
    new Promise<void>((resolve, reject) => {
      server.once('error', reject)
      server.listen(port, host, () => {
        server.off('error', reject)
        resolve()
      })
    })

  const stop = async () =>
    new Promise<void>((resolve, reject) => {
      if (!server.listening) {
        resolve()
        return
      }

      server.close(error => {
        if (error) {
          reject(error)
          return
        }

        resolve()
      })
    })

  return {
    server,
    start,
    stop
  }
}
