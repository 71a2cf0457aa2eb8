export {ContainerExecutor, type ExecOptions, type ExecResult} from './executor.js'
export {DockerCliExecutor} from './docker-executor.js'
export {SourceHost} from './source-host.js'
export {GithubSourceHost, type GithubSourceHostOptions} from './github-source-host.js'
export {imageRepository, imageTag, pinnedReference} from './image-ref.js'
